export abstract class BaseError extends Error {
  constructor(public code: string, public status: number, message?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingSlotError extends BaseError {
  constructor(readonly slotName: string) {
    super("MISSING_SLOT", 422, `Missing required slot: ${slotName}`);
  }
}

export class InvalidEventError extends BaseError {
  constructor(readonly issues: string[]) {
    super("INVALID_EVENT", 400, `Invalid event: ${issues.join("; ")}`);
  }
}

export class InvalidJsonError extends BaseError {
  constructor(cause: unknown) {
    super("INVALID_JSON", 400, cause instanceof Error ? cause.message : String(cause));
  }
}
