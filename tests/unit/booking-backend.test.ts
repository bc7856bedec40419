import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { bookingExists, SimulatedBookingBackend } from "../../src/booking-backend";
import { createLogger } from "../../src/logger";
import { silenceConsole } from "./helpers";

const logger = createLogger({ service: "test" });

describe("SimulatedBookingBackend", () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports rooms available for three draws in four", async () => {
    expect(await new SimulatedBookingBackend(() => 0.74).checkAvailability("double")).toBe(true);
    expect(await new SimulatedBookingBackend(() => 0.75).checkAvailability("double")).toBe(false);
  });

  it("counts between one and ten free rooms", async () => {
    expect(await new SimulatedBookingBackend(() => 0).countAvailableRooms("suite")).toBe(1);
    expect(await new SimulatedBookingBackend(() => 0.999).countAvailableRooms("suite")).toBe(10);
  });

  it("creates bookings unless the draw lands in the last two percent", async () => {
    const booking = {
      booking_number: "ABC12345",
      room_type: "single",
      check_in_date: "2026-11-02",
      nights: 1,
      total_price: 89.99,
      timestamp: "2026-10-19T10:00:00.000Z",
    };

    expect(await new SimulatedBookingBackend(() => 0.5).createBooking(booking, logger)).toEqual({ success: true });
    expect(await new SimulatedBookingBackend(() => 0.99).createBooking(booking, logger)).toEqual({ success: false });
  });

  it("only knows bookings starting with A or B", async () => {
    const backend = new SimulatedBookingBackend();

    expect(await backend.findBooking("bx123456")).toEqual({
      booking_number: "bx123456",
      room_type: "double",
      check_in_date: "2026-03-15",
      nights: 3,
      total_price: 389.97,
      status: "confirmed",
    });
    expect(await backend.findBooking("CX123456")).toBeUndefined();
    expect(bookingExists("")).toBe(false);
  });

  it("always cancels", async () => {
    expect(await new SimulatedBookingBackend().cancelBooking("AB123456", logger)).toEqual({ success: true });
  });
});
