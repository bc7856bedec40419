import { vi } from "vitest";
import type { BookingBackend } from "../../src/booking-backend";
import type { BackendResult, BookingDetails, BookingRecord, Slot } from "../../src/types";

export function slot(value: string): Slot {
  return {
    shape: "Scalar",
    value: { originalValue: value, interpretedValue: value, resolvedValues: [value] },
  };
}

export function lexEvent(
  intentName: string,
  slotValues: Record<string, string | null> = {},
  sessionAttributes?: Record<string, string>
) {
  const slots: Record<string, Slot | null> = {};
  for (const [name, value] of Object.entries(slotValues)) {
    slots[name] = value === null ? null : slot(value);
  }
  return {
    messageVersion: "1.0",
    invocationSource: "DialogCodeHook",
    inputTranscript: "book a room",
    sessionId: "session-1",
    sessionState: {
      sessionAttributes,
      intent: {
        name: intentName,
        slots,
        state: "InProgress",
        confirmationState: "None",
      },
    },
  };
}

export class FakeBookingBackend implements BookingBackend {
  available = true;
  roomCount = 5;
  createSucceeds = true;
  cancelSucceeds = true;
  bookings = new Map<string, BookingDetails>();
  created: BookingRecord[] = [];
  availabilityChecks: string[] = [];

  async checkAvailability(roomType: string): Promise<boolean> {
    this.availabilityChecks.push(roomType);
    return this.available;
  }

  async countAvailableRooms(): Promise<number> {
    return this.roomCount;
  }

  async createBooking(booking: BookingRecord): Promise<BackendResult> {
    this.created.push(booking);
    return { success: this.createSucceeds };
  }

  async findBooking(bookingNumber: string): Promise<BookingDetails | undefined> {
    return this.bookings.get(bookingNumber);
  }

  async cancelBooking(): Promise<BackendResult> {
    return { success: this.cancelSucceeds };
  }
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

export type ConsoleSpies = ReturnType<typeof silenceConsole>;

/** Parses the last JSON line written through one of the console spies. */
export function lastLogLine(spy: ConsoleSpies["log"]): unknown {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1]?.[0]));
}
