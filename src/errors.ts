export class TemplateSyntaxError extends Error {
  override readonly name = 'TemplateSyntaxError';

  constructor(
    readonly template: string,
    readonly offset: number,
    message?: string,
  ) {
    super(message ?? `Malformed template at offset ${offset}: ${JSON.stringify(template)}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ArityError extends Error {
  override readonly name = 'ArityError';

  constructor(
    readonly expected: number,
    readonly actual: number,
    message?: string,
  ) {
    super(message ?? `Arity mismatch: expected ${expected}, got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnfilledSlotError extends Error {
  override readonly name = 'UnfilledSlotError';

  constructor(
    readonly slotName: string,
    message?: string,
  ) {
    super(message ?? `Unfilled slot: "${slotName}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedTypeError extends Error {
  override readonly name: string = 'UnsupportedTypeError';

  constructor(
    readonly typeName: string,
    message?: string,
  ) {
    super(message ?? `Can't escape type ${typeName}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a fragment is supplied where only a bind value fits, e.g. as a
 * slot value for a prepared query whose text is already fixed.
 */
export class CompositionError extends UnsupportedTypeError {
  override readonly name = 'CompositionError';

  constructor(
    readonly slotName: string,
    message?: string,
  ) {
    super(
      'Fragment',
      message ?? `Slot "${slotName}" of a prepared query cannot take a fragment; bind a plain value or fill before preparing`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidUuidError extends UnsupportedTypeError {
  override readonly name = 'InvalidUuidError';

  constructor(
    readonly text: string,
    message?: string,
  ) {
    super('Uuid', message ?? `${JSON.stringify(text)} is not a valid UUID`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
