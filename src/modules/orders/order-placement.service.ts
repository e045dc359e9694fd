import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  DatabaseService,
  IsolationLevel,
  Transaction,
} from "../../database/database.service";
import { classifyStorageError } from "../../database/database-errors";
import { ProductsRepository } from "../products/products.repository";
import { OrdersRepository } from "./orders.repository";
import { OrderDetailsRepository } from "./order-details.repository";
import {
  PlaceOrderFailure,
  PlaceOrderRequest,
  PlaceOrderResult,
  describePlaceOrderFailure,
} from "./order-placement.types";
import { amountToCents, centsToMoney, parseMoneyToCents } from "../../common/utils/money";
import { errorMessage } from "../../common/utils/error-message";

interface OrderCharges {
  deliveryFee: string;
  discount: string;
}

function failure(error: PlaceOrderFailure): PlaceOrderResult {
  return { ok: false, error };
}

@Injectable()
export class OrderPlacementService {
  private readonly logger = new Logger(OrderPlacementService.name);
  private readonly isolationLevel: IsolationLevel;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly productsRepository: ProductsRepository,
    private readonly ordersRepository: OrdersRepository,
    private readonly orderDetailsRepository: OrderDetailsRepository,
    private readonly configService: ConfigService,
  ) {
    this.isolationLevel = this.configService.get<IsolationLevel>(
      "ORDER_ISOLATION_LEVEL",
      "read committed",
    );
    this.lockTimeoutMs = this.configService.get<number>(
      "ORDER_LOCK_TIMEOUT_MS",
      5000,
    );
  }

  /**
   * Reserve stock for a single product and record the order.
   *
   * The product row is locked for the rest of the transaction, so placements
   * against the same product run one after another while placements against
   * other products proceed. Either the order, its order line and the stock
   * decrement all commit, or nothing does. Failures are returned, not thrown.
   */
  async placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    const { customerId, productId, quantity } = request;

    const charges = this.validateRequest(request);
    if (!charges.ok) {
      this.logger.warn(
        `Rejected order request: ${describePlaceOrderFailure(charges.error)}`,
      );
      return failure(charges.error);
    }
    const orderCharges = charges.value;

    this.logger.log(
      `Placing order for customer ${customerId}: product ${productId} x${quantity}`,
    );

    let result: PlaceOrderResult;
    try {
      result = await this.databaseService.transaction(
        (tx) => this.reserveAndRecord(tx, request, orderCharges),
        {
          isolationLevel: this.isolationLevel,
          lockTimeoutMs: this.lockTimeoutMs,
        },
      );
    } catch (error) {
      const reason = classifyStorageError(error);
      this.logger.error(
        `Order placement for product ${productId} rolled back (${reason}): ${errorMessage(error)}`,
      );
      return failure({
        kind: "StorageFailure",
        reason,
        message: errorMessage(error),
      });
    }

    if (result.ok) {
      this.logger.log(
        `Placed order ${result.order.orderId} for ${result.order.orderAmount}; product ${productId} has ${result.order.remainingStock} left`,
      );
    } else {
      this.logger.warn(
        `Order not placed: ${describePlaceOrderFailure(result.error)}`,
      );
    }
    return result;
  }

  private validateRequest(
    request: PlaceOrderRequest,
  ): { ok: true; value: OrderCharges } | { ok: false; error: PlaceOrderFailure } {
    if (!Number.isSafeInteger(request.quantity) || request.quantity < 1) {
      return {
        ok: false,
        error: { kind: "InvalidQuantity", quantity: request.quantity },
      };
    }

    const deliveryFee = request.deliveryFee ?? 0;
    const deliveryFeeCents = amountToCents(deliveryFee);
    if (deliveryFeeCents === null) {
      return {
        ok: false,
        error: { kind: "InvalidAmount", field: "deliveryFee", value: deliveryFee },
      };
    }

    const discount = request.discount ?? 0;
    const discountCents = amountToCents(discount);
    if (discountCents === null) {
      return {
        ok: false,
        error: { kind: "InvalidAmount", field: "discount", value: discount },
      };
    }

    return {
      ok: true,
      value: {
        deliveryFee: centsToMoney(deliveryFeeCents),
        discount: centsToMoney(discountCents),
      },
    };
  }

  private async reserveAndRecord(
    tx: Transaction,
    request: PlaceOrderRequest,
    charges: OrderCharges,
  ): Promise<PlaceOrderResult> {
    const { customerId, productId, quantity } = request;

    // Stock and price come from the same locked read.
    const product = await this.productsRepository.findByIdForUpdate(tx, productId);
    if (!product) {
      return failure({ kind: "ProductNotFound", productId });
    }

    if (product.stockQuantity < quantity) {
      return failure({
        kind: "InsufficientStock",
        productId,
        requested: quantity,
        available: product.stockQuantity,
      });
    }

    const unitPriceCents = parseMoneyToCents(product.pricePerUnit);
    if (unitPriceCents === null) {
      return failure({ kind: "MissingPrice", productId });
    }

    // Nothing has been written up to here, so returning a failure above
    // only releases the lock.
    const unitPrice = centsToMoney(unitPriceCents);
    const order = await this.ordersRepository.create(
      {
        customerId,
        orderAmount: centsToMoney(unitPriceCents * quantity),
        deliveryFee: charges.deliveryFee,
        discountApplied: charges.discount,
      },
      tx,
    );

    const remainingStock = product.stockQuantity - quantity;
    await this.productsRepository.updateStockQuantity(tx, productId, remainingStock);

    await this.orderDetailsRepository.create(
      {
        orderId: order.orderId,
        productId,
        quantity,
        unitPrice,
        discount: charges.discount,
      },
      tx,
    );

    return {
      ok: true,
      order: {
        orderId: order.orderId,
        customerId: order.customerId,
        productId,
        quantity,
        unitPrice,
        orderAmount: order.orderAmount,
        deliveryFee: order.deliveryFee,
        discount: charges.discount,
        orderDate: order.orderDate,
        remainingStock,
      },
    };
  }
}
