// ─── Errors ──────────────────────────────────────────────────────────────────
//
// Every failure is thrown where it is detected. Value-level problems
// (bad notation, out-of-domain numbers) extend ValueError; operand and
// converter problems extend the built-in TypeError.
// ─────────────────────────────────────────────────────────────────────────────

/** A value was well-typed but not acceptable. */
export class ValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValueError";
  }
}

/** A notation string did not match its grammar. */
export class ParseError extends ValueError {
  readonly input: string;
  readonly expected: string;

  constructor(input: string, expected: string, detail?: string) {
    const reason = detail ? `: ${detail}` : "";
    super(`Cannot parse "${input}" as ${expected}${reason}`);
    this.name = "ParseError";
    this.input = input;
    this.expected = expected;
  }
}

/** A numeric value lies outside the legal domain. */
export class DomainError extends ValueError {
  readonly value: unknown;

  constructor(message: string, value?: unknown) {
    super(message);
    this.name = "DomainError";
    this.value = value;
  }
}

/** Two operands cannot be combined by the requested operation. */
export class TypeMismatchError extends TypeError {
  readonly left: string;
  readonly right: string | undefined;

  /** Omit `right` for unary operations. */
  constructor(operation: string, left: string, right?: string) {
    super(right === undefined ? `Cannot ${operation} ${left}` : `Cannot ${operation} ${left} and ${right}`);
    this.name = "TypeMismatchError";
    this.left = left;
    this.right = right;
  }
}

/** No converter is registered between two types. */
export class ConversionNotFoundError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`No converter registered from ${from} to ${to}`);
    this.name = "ConversionNotFoundError";
    this.from = from;
    this.to = to;
  }
}

/** A registered converter returned a value of the wrong shape. */
export class ConversionConsistencyError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "ConversionConsistencyError";
  }
}

/** A converter was registered from a type to itself. */
export class InvalidConverterError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConverterError";
  }
}

/** A converter already exists and the overwrite flag was not given. */
export class ConverterExistsError extends ValueError {
  readonly implicit: boolean;

  constructor(from: string, to: string, implicit: boolean) {
    const flag = implicit ? "overwriteImplicit" : "overwriteExplicit";
    const kind = implicit ? "An implicit" : "An explicit";
    super(`${kind} converter from ${from} to ${to} already exists (set ${flag} to replace it)`);
    this.name = "ConverterExistsError";
    this.implicit = implicit;
  }
}

/** The registry no longer accepts registrations. */
export class RegistryFrozenError extends Error {
  constructor(from: string, to: string) {
    super(`Cannot register converter from ${from} to ${to}: registry is frozen`);
    this.name = "RegistryFrozenError";
  }
}
