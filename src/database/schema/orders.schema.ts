import { pgTable, uuid, varchar, decimal, timestamp } from 'drizzle-orm/pg-core';
import { customers } from './customers.schema';

export const orders = pgTable('orders', {
  orderId: uuid('order_id').primaryKey().defaultRandom(),
  customerId: varchar('customer_id', { length: 20 }).references(() => customers.customerId, { onDelete: 'restrict' }).notNull(),
  orderDate: timestamp('order_date').defaultNow().notNull(),
  orderAmount: decimal('order_amount', { precision: 12, scale: 2 }).notNull(),
  deliveryFee: decimal('delivery_fee', { precision: 10, scale: 2 }).default('0.00').notNull(),
  discountApplied: decimal('discount_applied', { precision: 10, scale: 2 }).default('0.00').notNull()
});
