import type { Context } from "aws-lambda";
import { DateTime } from "luxon";
import { SimulatedBookingBackend, type BookingBackend } from "./booking-backend";
import { formatDateForDisplay, formatPounds, generateBookingNumber, parseNights } from "./booking-format";
import { appConfigIds, loadConfig } from "./config";
import { MissingSlotError } from "./errors";
import { close, parseLexEvent, requireSlotValue, scalarSlot, type LexEvent } from "./lex";
import { createLogger, errorFields, type Logger } from "./logger";
import { pricePerNight, roomRateSource, type RoomRateSource } from "./room-rates";
import type { BookingRecord, Intent, LexResponse } from "./types";

export interface FulfillmentDependencies {
  backend: BookingBackend;
  rates: RoomRateSource;
  newBookingNumber?: () => string;
  now?: () => DateTime;
}

type ResolvedDependencies = Required<FulfillmentDependencies>;

export function confirmationMessage(booking: BookingRecord): string {
  const { room_type, check_in_date, nights, total_price, booking_number } = booking;
  return (
    `Excellent! Your ${room_type} room has been successfully booked.\n\n` +
    `📅 Check-in: ${formatDateForDisplay(check_in_date)}\n` +
    `🌙 Duration: ${nights} night${nights > 1 ? "s" : ""}\n` +
    `💰 Total: ${formatPounds(total_price)}\n` +
    `🎫 Confirmation: ${booking_number}\n\n` +
    `A confirmation email has been sent. We look forward to welcoming you!`
  );
}

async function fulfillBookRoom(event: LexEvent, deps: ResolvedDependencies, logger: Logger): Promise<LexResponse> {
  const intent = event.sessionState.intent;

  try {
    const slots = intent.slots;
    const roomType = requireSlotValue(slots, "RoomType");
    const checkInDate = requireSlotValue(slots, "CheckInDate");
    const nightsValue = requireSlotValue(slots, "Nights");

    const nights = parseNights(nightsValue);
    if (nights === undefined) {
      throw new Error(`Nights is not a whole number: ${nightsValue}`);
    }

    const rates = await deps.rates.getRates(logger);
    const totalPrice = pricePerNight(rates, roomType) * nights;

    const booking: BookingRecord = {
      booking_number: deps.newBookingNumber(),
      room_type: roomType,
      check_in_date: checkInDate,
      nights,
      total_price: totalPrice,
      timestamp: deps.now().toISO() ?? new Date().toISOString(),
    };

    const result = await deps.backend.createBooking(booking, logger);
    if (!result.success) {
      logger.warn("Booking backend rejected booking", { bookingNumber: booking.booking_number });
      return close(
        intent,
        "Failed",
        "I'm sorry, there was an error processing your booking. Please try again or contact our support team."
      );
    }

    logger.info("Booking created", { booking });

    const sessionAttributes = {
      ...(event.sessionState.sessionAttributes ?? {}),
      lastBookingNumber: booking.booking_number,
      lastBookingTotal: totalPrice.toFixed(2),
    };

    const fulfilledIntent: Intent = intent.slots.BookingNumber
      ? intent
      : { ...intent, slots: { ...intent.slots, BookingNumber: scalarSlot(booking.booking_number) } };

    return close(fulfilledIntent, "Fulfilled", confirmationMessage(booking), sessionAttributes);
  } catch (error) {
    if (error instanceof MissingSlotError) {
      logger.error("Missing required slot", { slot: error.slotName });
      return close(intent, "Failed", "I'm sorry, some booking information is missing. Please try again.");
    }
    logger.error("Error fulfilling booking", errorFields(error));
    return close(intent, "Failed", "I'm sorry, an unexpected error occurred. Please try again or contact support.");
  }
}

async function fulfillCancelBooking(
  event: LexEvent,
  deps: ResolvedDependencies,
  logger: Logger
): Promise<LexResponse> {
  const intent = event.sessionState.intent;

  try {
    const bookingNumber = requireSlotValue(intent.slots, "BookingNumber");

    const booking = await deps.backend.findBooking(bookingNumber);
    if (!booking) {
      return close(
        intent,
        "Failed",
        `I couldn't find a booking with number ${bookingNumber}. Please verify and try again.`
      );
    }

    const result = await deps.backend.cancelBooking(bookingNumber, logger);
    if (!result.success) {
      return close(
        intent,
        "Failed",
        `There was an error cancelling booking ${bookingNumber}. Please contact our support team.`
      );
    }

    const message =
      `Your booking ${bookingNumber} has been successfully cancelled.\n\n` +
      `💰 Refund: ${formatPounds(booking.total_price)}\n` +
      `⏱️ Processing time: 5-7 business days\n\n` +
      `You will receive a confirmation email shortly. We hope to see you again in the future!`;

    return close(intent, "Fulfilled", message);
  } catch (error) {
    if (error instanceof MissingSlotError) {
      logger.error("Missing booking number", { slot: error.slotName });
      return close(intent, "Failed", "I need a booking number to process the cancellation.");
    }
    logger.error("Error fulfilling cancellation", errorFields(error));
    return close(intent, "Failed", "An unexpected error occurred. Please contact support.");
  }
}

/**
 * Builds the Lex V2 fulfillment code hook, invoked once every required slot
 * is collected and the intent is confirmed.
 */
export function createFulfillmentHandler(dependencies: FulfillmentDependencies) {
  const deps: ResolvedDependencies = {
    newBookingNumber: () => generateBookingNumber(),
    now: () => DateTime.now(),
    ...dependencies,
  };

  return async function handler(
    rawEvent: unknown,
    context?: Pick<Context, "awsRequestId">
  ): Promise<LexResponse> {
    const config = loadConfig();
    const requestLogger = createLogger({
      service: "fulfillment-hook",
      level: config.LOG_LEVEL,
      requestId: context?.awsRequestId,
    });

    const event = parseLexEvent(rawEvent, requestLogger);
    const intentName = event.sessionState.intent.name;
    const logger = requestLogger.child({ intent: intentName });
    logger.info("Received fulfillment event", { invocationSource: event.invocationSource });

    switch (intentName) {
      case "BookRoom":
        return fulfillBookRoom(event, deps, logger);
      case "CancelBooking":
        return fulfillCancelBooking(event, deps, logger);
      default:
        return close(event.sessionState.intent, "Failed", "I'm sorry, I couldn't process that request.");
    }
  };
}

export const handler = createFulfillmentHandler({
  backend: new SimulatedBookingBackend(),
  rates: roomRateSource(appConfigIds(loadConfig())),
});
