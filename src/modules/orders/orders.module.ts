import { Module } from "@nestjs/common";
import { DatabaseModule } from "../../database/database.module";
import { ProductsModule } from "../products/products.module";
import { OrdersRepository } from "./orders.repository";
import { OrderDetailsRepository } from "./order-details.repository";
import { OrderPlacementService } from "./order-placement.service";
import { OrdersService } from "./orders.service";
import { OrdersController } from "./orders.controller";

@Module({
  imports: [DatabaseModule, ProductsModule],
  controllers: [OrdersController],
  providers: [
    OrdersRepository,
    OrderDetailsRepository,
    OrderPlacementService,
    OrdersService,
  ],
  exports: [OrderPlacementService, OrdersService],
})
export class OrdersModule {}
