export type GcraErrorCode = "INVALID_QUOTA" | "INVALID_COST" | "COST_EXCEEDS_CAPACITY";

export class GcraError extends Error {
  constructor(
    readonly code: GcraErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Burst below 1 or a non-positive period. */
export class InvalidQuotaError extends GcraError {
  constructor(message: string) {
    super("INVALID_QUOTA", message);
  }
}

/** Cost that is zero, negative or not an integer. */
export class InvalidCostError extends GcraError {
  constructor(readonly cost: number) {
    super("INVALID_COST", `Cost should be a positive integer. Given: ${cost}.`);
  }
}

/** The cost can never be admitted under the quota, even on a fresh state. */
export class CostExceedsCapacityError extends GcraError {
  constructor(
    readonly cost: number,
    readonly maxBurst: number
  ) {
    super(
      "COST_EXCEEDS_CAPACITY",
      `Cost ${cost} exceeds the quota capacity of ${maxBurst} and will never succeed.`
    );
  }
}
