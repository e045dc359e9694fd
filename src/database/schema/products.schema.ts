import {
  pgTable,
  varchar,
  decimal,
  integer,
  timestamp,
  check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

export const products = pgTable(
  "products",
  {
    productId: varchar("product_id", { length: 20 }).primaryKey(),
    productName: varchar("product_name", { length: 200 }).notNull(),
    category: varchar("category", { length: 100 }),
    subCategory: varchar("sub_category", { length: 100 }),
    supplier: varchar("supplier", { length: 150 }),
    // Nullable: products can be listed before they are priced.
    pricePerUnit: decimal("price_per_unit", { precision: 10, scale: 2 }),
    stockQuantity: integer("stock_quantity").default(0).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    stockNonNegative: check(
      "products_stock_quantity_non_negative",
      sql`${table.stockQuantity} >= 0`,
    ),
  }),
);
