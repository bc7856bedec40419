import { randomUUID } from "crypto";
import { DateTime } from "luxon";

function uuidToBigInt(uuid: string): bigint {
  return BigInt(`0x${uuid.replace(/-/g, "")}`);
}

/**
 * Generates a confirmation number such as "KQD48213": three letters and five
 * digits taken from random UUIDs. Not guaranteed unique.
 */
export function generateBookingNumber(uuid: () => string = randomUUID): string {
  let letters = "";
  for (let i = 0; i < 3; i++) {
    letters += String.fromCharCode(65 + Number(uuidToBigInt(uuid()) % 26n));
  }
  const digits = uuidToBigInt(uuid()).toString().padStart(5, "0").slice(0, 5);
  return `${letters}${digits}`;
}

export function parseNights(value: string): number | undefined {
  return /^\s*[+-]?\d+\s*$/.test(value) ? Number.parseInt(value, 10) : undefined;
}

/** YYYY-MM-DD → DD/MM/YYYY. Anything unparseable comes back as given. */
export function formatDateForDisplay(isoDate: string): string {
  const date = DateTime.fromFormat(isoDate, "yyyy-MM-dd");
  return date.isValid ? date.toFormat("dd/MM/yyyy") : isoDate;
}

export function formatPounds(amount: number): string {
  return `£${amount.toFixed(2)}`;
}
