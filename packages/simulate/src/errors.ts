export class UnknownScenarioError extends Error {
  readonly code = "UNKNOWN_SCENARIO";

  constructor(readonly scenario: string) {
    super(`Unknown scenario: ${scenario}`);
    this.name = "UnknownScenarioError";
  }
}

export type InvalidUsageField = {
  field: string;
  message: string;
};

export class InvalidUsageError extends Error {
  readonly code = "INVALID_USAGE";

  constructor(readonly fields: InvalidUsageField[]) {
    super(
      `Please enter a valid number (${fields.map((f) => `${f.field}: ${f.message}`).join("; ")})`
    );
    this.name = "InvalidUsageError";
  }
}
