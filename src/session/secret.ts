const REDACTED = "[redacted]";

/** Holds the API key for the lifetime of one session; prints as "[redacted]". */
export class SecretValue {
  private value: string;

  constructor(value: string) {
    this.value = value.trim();
  }

  static empty() {
    return new SecretValue("");
  }

  get isEmpty() {
    return this.value.length === 0;
  }

  reveal() {
    return this.value;
  }

  clear() {
    this.value = "";
  }

  toString() {
    return REDACTED;
  }

  toJSON() {
    return REDACTED;
  }
}
