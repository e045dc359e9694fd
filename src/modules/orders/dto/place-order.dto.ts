import {
  IsString,
  IsNotEmpty,
  IsInt,
  Min,
  Max,
  IsNumber,
  IsOptional,
  MaxLength,
} from "class-validator";
import { MAX_AMOUNT } from "../../../common/utils/money";

export class PlaceOrderDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  customerId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  productId!: string;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_AMOUNT)
  @IsOptional()
  deliveryFee?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_AMOUNT)
  @IsOptional()
  discount?: number;
}

export interface PlaceOrderResponse {
  orderId: string;
  orderAmount: string;
  remainingStock: number;
}
