import { StorageFailureReason } from "../../database/database-errors";
import { MAX_AMOUNT } from "../../common/utils/money";

export interface PlaceOrderRequest {
  customerId: string;
  productId: string;
  quantity: number;
  deliveryFee?: number;
  discount?: number;
}

export interface PlacedOrder {
  orderId: string;
  customerId: string;
  productId: string;
  quantity: number;
  unitPrice: string;
  orderAmount: string;
  deliveryFee: string;
  discount: string;
  orderDate: Date;
  remainingStock: number;
}

export type PlaceOrderFailure =
  | { kind: "InvalidQuantity"; quantity: number }
  | { kind: "InvalidAmount"; field: "deliveryFee" | "discount"; value: number }
  | { kind: "ProductNotFound"; productId: string }
  | {
      kind: "InsufficientStock";
      productId: string;
      requested: number;
      available: number;
    }
  | { kind: "MissingPrice"; productId: string }
  | { kind: "StorageFailure"; reason: StorageFailureReason; message: string };

export type PlaceOrderResult =
  | { ok: true; order: PlacedOrder }
  | { ok: false; error: PlaceOrderFailure };

export function describePlaceOrderFailure(failure: PlaceOrderFailure): string {
  switch (failure.kind) {
    case "InvalidQuantity":
      return `Quantity must be a positive integer, got ${failure.quantity}`;
    case "InvalidAmount":
      return `${failure.field} must be an amount between 0 and ${MAX_AMOUNT} with at most two decimals, got ${failure.value}`;
    case "ProductNotFound":
      return `Product ${failure.productId} not found`;
    case "InsufficientStock":
      return `Insufficient stock for product ${failure.productId}. Available: ${failure.available}, Requested: ${failure.requested}`;
    case "MissingPrice":
      return `Product ${failure.productId} has no valid price`;
    case "StorageFailure":
      return `Storage failure (${failure.reason}): ${failure.message}`;
  }
}
