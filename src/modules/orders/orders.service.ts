import {
  Injectable,
  Logger,
  NotFoundException,
  BadRequestException,
} from "@nestjs/common";
import { isUUID } from "class-validator";
import { OrdersRepository } from "./orders.repository";
import { OrderDetailsRepository } from "./order-details.repository";
import { OrderWithDetails } from "../../database/types";
import { errorMessage } from "../../common/utils/error-message";

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    private readonly ordersRepository: OrdersRepository,
    private readonly orderDetailsRepository: OrderDetailsRepository,
  ) {}

  /**
   * Get an order together with its order lines
   */
  async getOrderWithDetails(orderId: string): Promise<OrderWithDetails> {
    try {
      if (!orderId || orderId.trim().length === 0) {
        throw new BadRequestException("Order ID is required");
      }
      // order_id is a uuid column; anything else fails the cast in the query
      if (!isUUID(orderId.trim())) {
        throw new BadRequestException("Order ID must be a UUID");
      }

      this.logger.log(`Retrieving order with details ${orderId}`);

      const order = await this.ordersRepository.findById(orderId.trim());
      if (!order) {
        throw new NotFoundException(`Order with ID ${orderId} not found`);
      }

      const details = await this.orderDetailsRepository.findByOrderId(
        order.orderId,
      );

      return { ...order, details };
    } catch (error) {
      this.logger.error(
        `Failed to retrieve order with details ${orderId}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }
}
