export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends DomainError {
  constructor(message = 'Invalid input') {
    super(message);
  }
}

export class InsufficientFundsError extends DomainError {
  constructor(message = 'Insufficient funds') {
    super(message);
  }
}

export class UnknownAccountError extends DomainError {
  constructor(
    public readonly owner: string,
    message = `Unknown account owner: ${owner}`
  ) {
    super(message);
  }
}
