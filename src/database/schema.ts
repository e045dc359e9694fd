// Re-export all schema definitions from the schema directory
export * from "./schema/customers.schema";
export * from "./schema/products.schema";
export * from "./schema/orders.schema";
export * from "./schema/order-details.schema";
