import { Injectable, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService, DatabaseExecutor } from '../../database/database.service';
import { orders } from '../../database/schema';
import { Order, NewOrder } from '../../database/types';
import { errorMessage } from '../../common/utils/error-message';

@Injectable()
export class OrdersRepository {
  private readonly logger = new Logger(OrdersRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async create(
    orderData: NewOrder,
    executor: DatabaseExecutor = this.databaseService.db,
  ): Promise<Order> {
    try {
      const [order] = await executor
        .insert(orders)
        .values(orderData)
        .returning();

      this.logger.log(`Created order with ID: ${order.orderId}`);
      return order;
    } catch (error) {
      this.logger.error(`Failed to create order: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findById(
    orderId: string,
    executor: DatabaseExecutor = this.databaseService.db,
  ): Promise<Order | null> {
    try {
      const [order] = await executor
        .select()
        .from(orders)
        .where(eq(orders.orderId, orderId))
        .limit(1);

      return order ?? null;
    } catch (error) {
      this.logger.error(`Failed to find order by ID ${orderId}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
