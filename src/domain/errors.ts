export class MailingPrepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FixedWidthLineError extends MailingPrepError {
  constructor(readonly lineNo: number, readonly actualLength: number, readonly expectedLength: number) {
    super(`Line ${lineNo}: expected ${expectedLength} characters, got ${actualLength}`);
  }
}

export class UnknownStateError extends MailingPrepError {
  constructor(readonly rowNo: number, readonly value: string) {
    super(`Row ${rowNo}: unknown Escheatment State abbreviation "${value}"`);
  }
}

export class UnsupportedInputError extends MailingPrepError {
  constructor(readonly filePath: string, reason: string) {
    super(`${filePath}: ${reason}`);
  }
}

export class InvalidLetterCodeError extends MailingPrepError {
  constructor(readonly value: string) {
    super(`Invalid letter code "${value}"`);
  }
}
