export class MalformedRecordError extends Error {
  public readonly record: string;

  constructor(message: string, record: string) {
    super(message);
    this.name = 'MalformedRecordError';
    this.record = record;
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}
