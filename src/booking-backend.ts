import type { Logger } from "./logger";
import type { BackendResult, BookingDetails, BookingRecord } from "./types";

/**
 * What the bot needs from the hotel's booking system.
 */
export interface BookingBackend {
  checkAvailability(roomType: string): Promise<boolean>;
  countAvailableRooms(roomType: string): Promise<number>;
  createBooking(booking: BookingRecord, logger: Logger): Promise<BackendResult>;
  findBooking(bookingNumber: string): Promise<BookingDetails | undefined>;
  cancelBooking(bookingNumber: string, logger: Logger): Promise<BackendResult>;
}

const EXISTING_BOOKING_PREFIXES = ["A", "B"];

export function bookingExists(bookingNumber: string): boolean {
  return EXISTING_BOOKING_PREFIXES.includes(bookingNumber.charAt(0).toUpperCase());
}

/**
 * Stand-in for a real booking system. Outcomes are drawn from `random`,
 * which defaults to Math.random.
 */
export class SimulatedBookingBackend implements BookingBackend {
  constructor(private readonly random: () => number = Math.random) {}

  async checkAvailability(_roomType: string): Promise<boolean> {
    return this.random() < 0.75;
  }

  async countAvailableRooms(_roomType: string): Promise<number> {
    return 1 + Math.floor(this.random() * 10);
  }

  async createBooking(booking: BookingRecord, logger: Logger): Promise<BackendResult> {
    logger.info("Creating booking", { booking });
    return { success: this.random() < 0.98 };
  }

  async findBooking(bookingNumber: string): Promise<BookingDetails | undefined> {
    if (!bookingExists(bookingNumber)) {
      return undefined;
    }
    return {
      booking_number: bookingNumber,
      room_type: "double",
      check_in_date: "2026-03-15",
      nights: 3,
      total_price: 389.97,
      status: "confirmed",
    };
  }

  async cancelBooking(bookingNumber: string, logger: Logger): Promise<BackendResult> {
    logger.info("Cancelling booking", { bookingNumber });
    return { success: true };
  }
}
