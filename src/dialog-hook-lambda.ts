import type { Context } from "aws-lambda";
import { DateTime } from "luxon";
import { SimulatedBookingBackend, type BookingBackend } from "./booking-backend";
import { parseNights } from "./booking-format";
import { loadConfig } from "./config";
import { close, delegate, elicitSlot, parseLexEvent, slotValue, type LexEvent } from "./lex";
import { createLogger, type Logger } from "./logger";
import type { LexResponse } from "./types";

export const ROOM_TYPES = ["single", "double", "suite"];
export const MAX_ADVANCE_DAYS = 365;
export const MIN_NIGHTS = 1;
export const MAX_NIGHTS = 30;

const BOOKING_REQUIRED_SLOTS = ["RoomType", "CheckInDate", "Nights"];

export interface DialogHookDependencies {
  backend: BookingBackend;
  now?: () => DateTime;
}

interface Violation {
  slot: string;
  message: string;
}

export function validateRoomType(roomType: string): Violation | undefined {
  if (!ROOM_TYPES.includes(roomType.toLowerCase())) {
    return {
      slot: "RoomType",
      message: "I'm sorry, we only have single, double, or suite rooms. Which would you prefer?",
    };
  }
  return undefined;
}

/**
 * Check-in must be an ISO date between today and one year from now.
 */
export function validateCheckInDate(value: string, now: DateTime): Violation | undefined {
  const checkIn = DateTime.fromFormat(value, "yyyy-MM-dd", { zone: now.zone });

  if (!checkIn.isValid) {
    return {
      slot: "CheckInDate",
      message: "I couldn't understand that date. Please provide the check-in date in DD/MM/YYYY format.",
    };
  }

  if (checkIn.toMillis() < now.startOf("day").toMillis()) {
    return {
      slot: "CheckInDate",
      message: "The check-in date cannot be in the past. Please provide a future date.",
    };
  }

  if (checkIn.toMillis() > now.plus({ days: MAX_ADVANCE_DAYS }).toMillis()) {
    return {
      slot: "CheckInDate",
      message: "We can only accept bookings up to one year in advance. Please choose an earlier date.",
    };
  }

  return undefined;
}

export function validateNights(value: string): Violation | undefined {
  const nights = parseNights(value);

  if (nights === undefined) {
    return { slot: "Nights", message: "Please provide a valid number of nights." };
  }
  if (nights < MIN_NIGHTS) {
    return {
      slot: "Nights",
      message: "You must book at least one night. How many nights would you like to stay?",
    };
  }
  if (nights > MAX_NIGHTS) {
    return {
      slot: "Nights",
      message:
        "We can only accept bookings up to 30 nights. For longer stays, please contact our reservations team.",
    };
  }
  return undefined;
}

async function handleBookRoom(
  event: LexEvent,
  deps: Required<DialogHookDependencies>,
  logger: Logger
): Promise<LexResponse> {
  const intent = event.sessionState.intent;
  const slots = intent.slots;

  const roomType = slotValue(slots, "RoomType");
  const checkInDate = slotValue(slots, "CheckInDate");
  const nights = slotValue(slots, "Nights");

  const violation =
    (roomType !== undefined ? validateRoomType(roomType) : undefined) ??
    (checkInDate !== undefined ? validateCheckInDate(checkInDate, deps.now()) : undefined) ??
    (nights !== undefined ? validateNights(nights) : undefined);

  if (violation) {
    logger.info("Slot rejected", { slot: violation.slot });
    return elicitSlot(intent, violation.slot, violation.message);
  }

  if (roomType !== undefined && BOOKING_REQUIRED_SLOTS.every((name) => slotValue(slots, name) !== undefined)) {
    const available = await deps.backend.checkAvailability(roomType);
    logger.info("Room availability checked", { roomType, available });

    if (!available) {
      return elicitSlot(
        intent,
        "RoomType",
        `I'm sorry, we don't have any ${roomType} rooms available for those dates. Would you like to try a different room type?`
      );
    }
  }

  return delegate(intent);
}

async function handleCancelBooking(
  event: LexEvent,
  deps: Required<DialogHookDependencies>,
  logger: Logger
): Promise<LexResponse> {
  const intent = event.sessionState.intent;
  const bookingNumber = slotValue(intent.slots, "BookingNumber");

  if (bookingNumber !== undefined) {
    if (!/^[A-Za-z0-9]{6,8}$/.test(bookingNumber)) {
      return elicitSlot(
        intent,
        "BookingNumber",
        "That doesn't look like a valid booking number. Booking numbers are 6-8 alphanumeric characters. Please try again."
      );
    }

    const booking = await deps.backend.findBooking(bookingNumber);
    if (!booking) {
      logger.info("Booking not found", { bookingNumber });
      return elicitSlot(
        intent,
        "BookingNumber",
        `I couldn't find a booking with number ${bookingNumber}. Please verify and try again.`
      );
    }
  }

  return delegate(intent);
}

async function handleCheckAvailability(
  event: LexEvent,
  deps: Required<DialogHookDependencies>
): Promise<LexResponse> {
  const intent = event.sessionState.intent;
  const roomType = slotValue(intent.slots, "RoomType");

  if (roomType !== undefined) {
    const count = await deps.backend.countAvailableRooms(roomType);
    return close(intent, "Fulfilled", `We currently have ${count} ${roomType} rooms available.`);
  }

  return close(
    intent,
    "Fulfilled",
    "We have rooms available across all our room types. Would you like to book one?"
  );
}

/**
 * Builds the Lex V2 dialog code hook. It runs on every turn, before Lex
 * fills a slot.
 */
export function createDialogHookHandler(dependencies: DialogHookDependencies) {
  const deps: Required<DialogHookDependencies> = {
    now: () => DateTime.now(),
    ...dependencies,
  };

  return async function handler(
    rawEvent: unknown,
    context?: Pick<Context, "awsRequestId">
  ): Promise<LexResponse> {
    const config = loadConfig();
    const requestLogger = createLogger({
      service: "dialog-hook",
      level: config.LOG_LEVEL,
      requestId: context?.awsRequestId,
    });

    const event = parseLexEvent(rawEvent, requestLogger);
    const intentName = event.sessionState.intent.name;
    const logger = requestLogger.child({ intent: intentName });
    logger.info("Received dialog event", {
      invocationSource: event.invocationSource,
      inputTranscript: event.inputTranscript,
    });

    switch (intentName) {
      case "BookRoom":
        return handleBookRoom(event, deps, logger);
      case "CancelBooking":
        return handleCancelBooking(event, deps, logger);
      case "CheckAvailability":
        return handleCheckAvailability(event, deps);
      default:
        return delegate(event.sessionState.intent);
    }
  };
}

export const handler = createDialogHookHandler({ backend: new SimulatedBookingBackend() });
