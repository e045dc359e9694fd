import { pgTable, uuid, varchar, integer, decimal, primaryKey } from 'drizzle-orm/pg-core';
import { orders } from './orders.schema';
import { products } from './products.schema';

export const orderDetails = pgTable('order_details', {
  orderId: uuid('order_id').references(() => orders.orderId, { onDelete: 'cascade' }).notNull(),
  productId: varchar('product_id', { length: 20 }).references(() => products.productId, { onDelete: 'restrict' }).notNull(),
  quantity: integer('quantity').notNull(),
  unitPrice: decimal('unit_price', { precision: 10, scale: 2 }).notNull(), // Price at time of order
  discount: decimal('discount', { precision: 10, scale: 2 }).default('0.00').notNull()
}, (table) => ({
  pk: primaryKey({ columns: [table.orderId, table.productId] })
}));
