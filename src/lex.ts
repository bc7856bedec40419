import { z } from "zod";
import { InvalidEventError, MissingSlotError } from "./errors";
import { errorFields, type Logger } from "./logger";
import type { Intent, IntentState, LexResponse, Slot, Slots } from "./types";

const SlotSchema = z
  .object({
    shape: z.string().optional(),
    value: z
      .object({
        originalValue: z.string().optional(),
        interpretedValue: z.string().optional(),
        resolvedValues: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const IntentSchema = z
  .object({
    name: z.string().min(1),
    slots: z.record(SlotSchema.nullable()).nullish().transform((slots) => slots ?? {}),
    state: z.string().optional(),
    confirmationState: z.string().optional(),
  })
  .passthrough();

export const LexEventSchema = z
  .object({
    invocationSource: z.enum(["DialogCodeHook", "FulfillmentCodeHook"]).optional(),
    inputTranscript: z.string().optional(),
    sessionState: z
      .object({
        intent: IntentSchema,
        sessionAttributes: z.record(z.string()).nullish(),
      })
      .passthrough(),
  })
  .passthrough();

export type LexEvent = z.infer<typeof LexEventSchema>;

/**
 * Validates an incoming Lex V2 event. Without an intent no Lex response can
 * be built, so a malformed event is raised to the Lambda runtime.
 */
export function parseLexEvent(event: unknown, logger: Logger): LexEvent {
  const parsed = LexEventSchema.safeParse(event);
  if (!parsed.success) {
    const error = new InvalidEventError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
    logger.error("Rejected Lex event", { ...errorFields(error), issues: error.issues });
    throw error;
  }
  return parsed.data;
}

/** Interpreted value of a slot, or undefined when the slot is not filled. */
export function slotValue(slots: Slots, name: string): string | undefined {
  return slots[name]?.value?.interpretedValue;
}

export function requireSlotValue(slots: Slots, name: string): string {
  const value = slotValue(slots, name);
  if (value === undefined) {
    throw new MissingSlotError(name);
  }
  return value;
}

export function scalarSlot(value: string): Slot {
  return {
    shape: "Scalar",
    value: {
      originalValue: value,
      interpretedValue: value,
      resolvedValues: [value],
    },
  };
}

// Response builders

export function delegate(intent: Intent): LexResponse {
  return {
    sessionState: {
      dialogAction: { type: "Delegate" },
      intent,
    },
  };
}

export function elicitSlot(intent: Intent, slotToElicit: string, message: string): LexResponse {
  return {
    sessionState: {
      dialogAction: { type: "ElicitSlot", slotToElicit },
      intent,
    },
    messages: [{ contentType: "PlainText", content: message }],
  };
}

export function close(
  intent: Intent,
  state: Extract<IntentState, "Fulfilled" | "Failed">,
  message: string,
  sessionAttributes?: Record<string, string>
): LexResponse {
  const response: LexResponse = {
    sessionState: {
      dialogAction: { type: "Close" },
      intent: { ...intent, state },
    },
    messages: [{ contentType: "PlainText", content: message }],
  };

  if (sessionAttributes && Object.keys(sessionAttributes).length > 0) {
    response.sessionState.sessionAttributes = sessionAttributes;
  }

  return response;
}
