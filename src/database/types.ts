import { InferSelectModel, InferInsertModel } from "drizzle-orm";
import { customers, products, orders, orderDetails } from "./schema";

// Select types (for reading from database)
export type Customer = InferSelectModel<typeof customers>;
export type Product = InferSelectModel<typeof products>;
export type Order = InferSelectModel<typeof orders>;
export type OrderDetail = InferSelectModel<typeof orderDetails>;

// Insert types (for creating new records)
export type NewOrder = InferInsertModel<typeof orders>;
export type NewOrderDetail = InferInsertModel<typeof orderDetails>;

// Extended types with relations
export type OrderWithDetails = Order & {
  details: OrderDetail[];
};
