import {
  pgTable,
  varchar,
  boolean,
  timestamp,
} from "drizzle-orm/pg-core";

export const customers = pgTable("customers", {
  customerId: varchar("customer_id", { length: 20 }).primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  email: varchar("email", { length: 200 }).unique(),
  city: varchar("city", { length: 100 }),
  primeMember: boolean("prime_member").default(false).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});
