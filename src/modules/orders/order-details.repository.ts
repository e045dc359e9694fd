import { Injectable, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService, DatabaseExecutor } from '../../database/database.service';
import { orderDetails } from '../../database/schema';
import { OrderDetail, NewOrderDetail } from '../../database/types';
import { errorMessage } from '../../common/utils/error-message';

@Injectable()
export class OrderDetailsRepository {
  private readonly logger = new Logger(OrderDetailsRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async create(
    detailData: NewOrderDetail,
    executor: DatabaseExecutor = this.databaseService.db,
  ): Promise<OrderDetail> {
    try {
      const [detail] = await executor
        .insert(orderDetails)
        .values(detailData)
        .returning();

      this.logger.log(
        `Added product ${detail.productId} x${detail.quantity} to order ${detail.orderId}`,
      );
      return detail;
    } catch (error) {
      this.logger.error(`Failed to create order detail: ${errorMessage(error)}`);
      throw error;
    }
  }

  async findByOrderId(
    orderId: string,
    executor: DatabaseExecutor = this.databaseService.db,
  ): Promise<OrderDetail[]> {
    try {
      return await executor
        .select()
        .from(orderDetails)
        .where(eq(orderDetails.orderId, orderId));
    } catch (error) {
      this.logger.error(`Failed to find details for order ${orderId}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
