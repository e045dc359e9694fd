import { randomUUID } from "crypto";
import { Provider } from "@nestjs/common";
import { DatabaseService, TransactionOptions } from "../database/database.service";
import {
  Customer,
  NewOrder,
  NewOrderDetail,
  Order,
  OrderDetail,
  Product,
} from "../database/types";
import { ProductsRepository } from "../modules/products/products.repository";
import { OrdersRepository } from "../modules/orders/orders.repository";
import { OrderDetailsRepository } from "../modules/orders/order-details.repository";

/**
 * In-process stand-in for the order tables.
 *
 * Mirrors what the placement transaction relies on from PostgreSQL under
 * read committed: writes stay private to a transaction until commit, row
 * locks are exclusive and queue their waiters, a lock wait longer than the
 * transaction's lock timeout fails with SQLSTATE 55P03, and foreign key,
 * primary key and check constraints are enforced.
 */

export type StoreOperation =
  | "lockProduct"
  | "updateStock"
  | "insertOrder"
  | "insertOrderDetail";

export interface StoreSnapshot {
  products: Product[];
  orders: Order[];
  orderDetails: OrderDetail[];
}

export class StoreError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export class InMemoryTransaction {
  readonly heldLocks = new Set<string>();
  readonly stockWrites = new Map<string, number>();
  readonly orders: Order[] = [];
  readonly orderDetails: OrderDetail[] = [];

  constructor(
    readonly id: number,
    readonly lockTimeoutMs: number,
  ) {}
}

interface LockWaiter {
  tx: InMemoryTransaction;
  grant: () => void;
}

interface RowLock {
  owner: InMemoryTransaction;
  waiters: LockWaiter[];
}

const DEFAULT_LOCK_TIMEOUT_MS = 1000;

export class InMemoryCommerceStore {
  private readonly products = new Map<string, Product>();
  private readonly customers = new Map<string, Customer>();
  private readonly orders = new Map<string, Order>();
  private readonly orderDetails: OrderDetail[] = [];
  private readonly locks = new Map<string, RowLock>();
  private readonly failures = new Map<StoreOperation, Error>();
  private nextTransactionId = 1;

  seedProduct(product: Pick<Product, "productId"> & Partial<Product>): void {
    const now = new Date("2024-01-01T00:00:00Z");
    this.products.set(product.productId, {
      productName: `Product ${product.productId}`,
      category: null,
      subCategory: null,
      supplier: null,
      pricePerUnit: null,
      stockQuantity: 0,
      createdAt: now,
      updatedAt: now,
      ...product,
    });
  }

  seedCustomer(customer: Pick<Customer, "customerId"> & Partial<Customer>): void {
    this.customers.set(customer.customerId, {
      name: `Customer ${customer.customerId}`,
      email: null,
      city: null,
      primeMember: false,
      createdAt: new Date("2024-01-01T00:00:00Z"),
      ...customer,
    });
  }

  /** Makes the next call of `operation` throw `error`. */
  failNext(operation: StoreOperation, error: Error): void {
    this.failures.set(operation, error);
  }

  getProduct(productId: string): Product | undefined {
    return this.products.get(productId);
  }

  getOrder(orderId: string): Order | undefined {
    return this.orders.get(orderId);
  }

  listOrders(): Order[] {
    return [...this.orders.values()];
  }

  listOrderDetails(): OrderDetail[] {
    return [...this.orderDetails];
  }

  snapshot(): StoreSnapshot {
    return structuredClone({
      products: [...this.products.values()],
      orders: this.listOrders(),
      orderDetails: this.listOrderDetails(),
    });
  }

  async transaction<T>(
    callback: (tx: InMemoryTransaction) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const tx = new InMemoryTransaction(
      this.nextTransactionId++,
      options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
    );

    try {
      const result = await callback(tx);
      this.commit(tx);
      return result;
    } finally {
      this.releaseLocks(tx);
    }
  }

  async lockProduct(tx: InMemoryTransaction, productId: string): Promise<void> {
    await this.yieldToOthers();
    this.throwIfFailing("lockProduct");

    const lock = this.locks.get(productId);
    if (!lock) {
      this.locks.set(productId, { owner: tx, waiters: [] });
      tx.heldLocks.add(productId);
      return;
    }
    if (lock.owner === tx) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const waiter: LockWaiter = {
        tx,
        grant: () => {
          clearTimeout(timer);
          resolve();
        },
      };
      const timer = setTimeout(() => {
        const index = lock.waiters.indexOf(waiter);
        if (index >= 0) {
          lock.waiters.splice(index, 1);
        }
        reject(new StoreError("canceling statement due to lock timeout", "55P03"));
      }, tx.lockTimeoutMs);
      lock.waiters.push(waiter);
    });
    tx.heldLocks.add(productId);
  }

  /** SELECT ... FOR UPDATE: waits for the lock, then reads the latest committed row. */
  async findProductForUpdate(
    tx: InMemoryTransaction,
    productId: string,
  ): Promise<Product | null> {
    await this.lockProduct(tx, productId);

    const product = this.products.get(productId);
    if (!product) {
      return null;
    }
    const stockQuantity = tx.stockWrites.get(productId) ?? product.stockQuantity;
    return { ...product, stockQuantity };
  }

  async updateStock(
    tx: InMemoryTransaction,
    productId: string,
    stockQuantity: number,
  ): Promise<void> {
    await this.lockProduct(tx, productId);
    this.throwIfFailing("updateStock");

    if (stockQuantity < 0) {
      throw new StoreError(
        'new row for relation "products" violates check constraint "products_stock_quantity_non_negative"',
        "23514",
      );
    }
    if (this.products.has(productId)) {
      tx.stockWrites.set(productId, stockQuantity);
    }
  }

  async insertOrder(tx: InMemoryTransaction, data: NewOrder): Promise<Order> {
    await this.yieldToOthers();
    this.throwIfFailing("insertOrder");

    if (!this.customers.has(data.customerId)) {
      throw new StoreError(
        'insert or update on table "orders" violates foreign key constraint "orders_customer_id_customers_customer_id_fk"',
        "23503",
      );
    }

    const order: Order = {
      orderId: data.orderId ?? randomUUID(),
      customerId: data.customerId,
      orderDate: data.orderDate ?? new Date(),
      orderAmount: data.orderAmount,
      deliveryFee: data.deliveryFee ?? "0.00",
      discountApplied: data.discountApplied ?? "0.00",
    };
    tx.orders.push(order);
    return { ...order };
  }

  async insertOrderDetail(
    tx: InMemoryTransaction,
    data: NewOrderDetail,
  ): Promise<OrderDetail> {
    await this.yieldToOthers();
    this.throwIfFailing("insertOrderDetail");

    const orderVisible =
      this.orders.has(data.orderId) ||
      tx.orders.some((order) => order.orderId === data.orderId);
    if (!orderVisible || !this.products.has(data.productId)) {
      throw new StoreError(
        'insert or update on table "order_details" violates foreign key constraint',
        "23503",
      );
    }

    const duplicate = [...this.orderDetails, ...tx.orderDetails].some(
      (detail) =>
        detail.orderId === data.orderId && detail.productId === data.productId,
    );
    if (duplicate) {
      throw new StoreError(
        'duplicate key value violates unique constraint "order_details_order_id_product_id_pk"',
        "23505",
      );
    }

    const detail: OrderDetail = {
      orderId: data.orderId,
      productId: data.productId,
      quantity: data.quantity,
      unitPrice: data.unitPrice,
      discount: data.discount ?? "0.00",
    };
    tx.orderDetails.push(detail);
    return { ...detail };
  }

  /**
   * Providers that back DatabaseService and the order repositories with this
   * store, for use in Test.createTestingModule.
   */
  providers(): Provider[] {
    return [
      {
        provide: DatabaseService,
        useValue: {
          transaction: <T>(
            callback: (tx: InMemoryTransaction) => Promise<T>,
            options?: TransactionOptions,
          ) => this.transaction(callback, options),
        },
      },
      {
        provide: ProductsRepository,
        useValue: {
          findByIdForUpdate: (tx: unknown, productId: string) =>
            this.findProductForUpdate(this.asTransaction(tx), productId),
          updateStockQuantity: (tx: unknown, productId: string, stockQuantity: number) =>
            this.updateStock(this.asTransaction(tx), productId, stockQuantity),
        },
      },
      {
        provide: OrdersRepository,
        useValue: {
          create: (data: NewOrder, tx: unknown) =>
            this.insertOrder(this.asTransaction(tx), data),
        },
      },
      {
        provide: OrderDetailsRepository,
        useValue: {
          create: (data: NewOrderDetail, tx: unknown) =>
            this.insertOrderDetail(this.asTransaction(tx), data),
        },
      },
    ];
  }

  private asTransaction(tx: unknown): InMemoryTransaction {
    if (!(tx instanceof InMemoryTransaction)) {
      throw new Error("Store operations must run inside a store transaction");
    }
    return tx;
  }

  private commit(tx: InMemoryTransaction): void {
    for (const [productId, stockQuantity] of tx.stockWrites) {
      const product = this.products.get(productId);
      if (product) {
        this.products.set(productId, { ...product, stockQuantity });
      }
    }
    for (const order of tx.orders) {
      this.orders.set(order.orderId, order);
    }
    this.orderDetails.push(...tx.orderDetails);
  }

  private releaseLocks(tx: InMemoryTransaction): void {
    for (const productId of tx.heldLocks) {
      const lock = this.locks.get(productId);
      if (!lock || lock.owner !== tx) {
        continue;
      }

      const next = lock.waiters.shift();
      if (next) {
        lock.owner = next.tx;
        next.grant();
      } else {
        this.locks.delete(productId);
      }
    }
    tx.heldLocks.clear();
  }

  private throwIfFailing(operation: StoreOperation): void {
    const error = this.failures.get(operation);
    if (error) {
      this.failures.delete(operation);
      throw error;
    }
  }

  // Lets concurrently started transactions interleave between statements.
  private yieldToOthers(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }
}
