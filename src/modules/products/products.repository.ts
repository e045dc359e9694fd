import { Injectable, Logger } from '@nestjs/common';
import { eq, sql } from 'drizzle-orm';
import { DatabaseService, DatabaseExecutor } from '../../database/database.service';
import { products } from '../../database/schema';
import { Product } from '../../database/types';
import { errorMessage } from '../../common/utils/error-message';

@Injectable()
export class ProductsRepository {
  private readonly logger = new Logger(ProductsRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * SELECT ... FOR UPDATE. Only meaningful inside a transaction: the row stays
   * locked against other lockers and writers until that transaction ends.
   */
  async findByIdForUpdate(executor: DatabaseExecutor, productId: string): Promise<Product | null> {
    try {
      const [product] = await executor
        .select()
        .from(products)
        .where(eq(products.productId, productId))
        .limit(1)
        .for('update');

      return product ?? null;
    } catch (error) {
      this.logger.error(`Failed to lock product ${productId}: ${errorMessage(error)}`);
      throw error;
    }
  }

  async updateStockQuantity(
    executor: DatabaseExecutor,
    productId: string,
    stockQuantity: number,
  ): Promise<void> {
    try {
      await executor
        .update(products)
        .set({ stockQuantity, updatedAt: sql`now()` })
        .where(eq(products.productId, productId));

      this.logger.log(`Set stock for product ${productId} to ${stockQuantity}`);
    } catch (error) {
      this.logger.error(`Failed to update stock for product ${productId}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
