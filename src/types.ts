// Type definitions
export interface LambdaResponse {
  statusCode: number;
  body: string;
}

export interface HttpResponse extends LambdaResponse {
  headers: Record<string, string>;
}

export interface SlotValue {
  originalValue?: string;
  interpretedValue?: string;
  resolvedValues?: string[];
}

export interface Slot {
  shape?: string;
  value?: SlotValue;
}

export type Slots = Record<string, Slot | null>;

export type IntentState =
  | "Failed"
  | "Fulfilled"
  | "FulfillmentInProgress"
  | "InProgress"
  | "ReadyForFulfillment"
  | "Waiting";

export interface Intent {
  name: string;
  slots: Slots;
  state?: string;
  confirmationState?: string;
  [key: string]: unknown;
}

export type DialogAction =
  | { type: "Delegate" }
  | { type: "Close" }
  | { type: "ElicitSlot"; slotToElicit: string };

export interface LexMessage {
  contentType: "PlainText";
  content: string;
}

/**
 * Response returned to Lex V2 from a dialog or fulfillment code hook.
 */
export interface LexResponse {
  sessionState: {
    dialogAction: DialogAction;
    intent: Intent;
    sessionAttributes?: Record<string, string>;
  };
  messages?: LexMessage[];
}

/**
 * A booking as handed to the booking backend. Never persisted by this code.
 */
export interface BookingRecord {
  booking_number: string;
  room_type: string;
  /** ISO date (YYYY-MM-DD) */
  check_in_date: string;
  nights: number;
  total_price: number;
  timestamp: string;
}

export interface BookingDetails extends Omit<BookingRecord, "timestamp"> {
  status: string;
}

export interface BackendResult {
  success: boolean;
}
