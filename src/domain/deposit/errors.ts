export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NegativeAmountError extends DomainError {
  constructor(message = 'Deposit amount cannot be negative') {
    super(message);
  }
}

export class AmountTooLargeError extends DomainError {
  constructor(
    public readonly ceiling: number,
    message = `The maximum deposit amount for the fixed account is ${ceiling.toLocaleString('en-US')}. Please deposit less.`
  ) {
    super(message);
  }
}

export class NotNumericError extends DomainError {
  constructor(message = 'Invalid amount. Please enter a numeric value.') {
    super(message);
  }
}

export class NotAlphabeticError extends DomainError {
  constructor(message = 'Invalid name. Only letters are allowed.') {
    super(message);
  }
}
