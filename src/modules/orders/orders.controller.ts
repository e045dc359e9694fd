import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
  HttpException,
  Logger,
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
  ServiceUnavailableException,
  InternalServerErrorException,
} from "@nestjs/common";
import { OrderPlacementService } from "./order-placement.service";
import { OrdersService } from "./orders.service";
import { PlaceOrderDto, PlaceOrderResponse } from "./dto/place-order.dto";
import {
  PlaceOrderFailure,
  describePlaceOrderFailure,
} from "./order-placement.types";
import { isRetryableStorageFailure } from "../../database/database-errors";
import { OrderWithDetails } from "../../database/types";

@Controller("orders")
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);

  constructor(
    private readonly orderPlacementService: OrderPlacementService,
    private readonly ordersService: OrdersService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async placeOrder(@Body() body: PlaceOrderDto): Promise<PlaceOrderResponse> {
    const result = await this.orderPlacementService.placeOrder(body);

    if (!result.ok) {
      throw this.toHttpException(result.error);
    }

    return {
      orderId: result.order.orderId,
      orderAmount: result.order.orderAmount,
      remainingStock: result.order.remainingStock,
    };
  }

  @Get(":id")
  async getOrder(@Param("id", ParseUUIDPipe) id: string): Promise<OrderWithDetails> {
    return this.ordersService.getOrderWithDetails(id);
  }

  private toHttpException(error: PlaceOrderFailure): HttpException {
    const message = describePlaceOrderFailure(error);

    switch (error.kind) {
      case "InvalidQuantity":
      case "InvalidAmount":
        return new BadRequestException(message);
      case "ProductNotFound":
        return new NotFoundException(message);
      case "InsufficientStock":
        return new ConflictException(message);
      case "MissingPrice":
        return new UnprocessableEntityException(message);
      case "StorageFailure":
        if (isRetryableStorageFailure(error.reason)) {
          return new ServiceUnavailableException("Order could not be placed, try again");
        }
        if (error.reason === "constraint_violation") {
          return new ConflictException("Order conflicts with existing data");
        }
        if (error.reason === "invalid_value") {
          return new UnprocessableEntityException("Order values were rejected by the database");
        }
        // Driver messages stay in the logs
        this.logger.error(`Unexpected storage failure: ${error.message}`);
        return new InternalServerErrorException("Order could not be placed");
    }
  }
}
