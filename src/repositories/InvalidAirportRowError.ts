export class InvalidAirportRowError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Navigation database returned an invalid airport row: ${issues.join('; ')}`);
    this.name = 'InvalidAirportRowError';
    this.issues = issues;
    Object.setPrototypeOf(this, InvalidAirportRowError.prototype);
  }
}
