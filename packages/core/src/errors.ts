export class DateParseError extends Error {
  readonly text: string;

  constructor(text: string, options?: ErrorOptions) {
    super(`Couldn't parse date string: ${text}`, options);
    this.name = "DateParseError";
    this.text = text;
  }
}

export class InvalidTimestampError extends Error {
  readonly value: number;

  constructor(value: number) {
    super(`Timestamp out of range: ${value}`);
    this.name = "InvalidTimestampError";
    this.value = value;
  }
}
