/**
 * Custom Error Classes
 */

export class WalletError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WalletError';
  }
}

/**
 * Shared shape for error families that carry a discriminating code and,
 * where it applies, the expected and found values.
 */
export interface ErrorDetails {
  expected?: string;
  found?: string;
  cause?: unknown;
}

export type MnemonicErrorCode =
  | 'InvalidWordCount'
  | 'InvalidEntropyLength'
  | 'InvalidWord'
  | 'InvalidPhrase'
  | 'InvalidLanguage';

export class MnemonicError extends WalletError {
  public readonly code: MnemonicErrorCode;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(code: MnemonicErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'MnemonicError';
    this.code = code;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type DerivationPathErrorCode =
  | 'InvalidDerivationPath'
  | 'InvalidChildNumber'
  | 'InvalidChildNumberFormat'
  | 'ExpectedBIP44Path'
  | 'ExpectedBIP49Path'
  | 'ExpectedBIP84Path'
  | 'PathTooLong';

export class DerivationPathError extends WalletError {
  public readonly code: DerivationPathErrorCode;

  constructor(code: DerivationPathErrorCode, message: string) {
    super(message);
    this.name = 'DerivationPathError';
    this.code = code;
  }
}

export type ExtendedKeyErrorCode =
  | 'MaximumChildDepthReached'
  | 'InvalidChildNumber'
  | 'InvalidByteLength'
  | 'InvalidChecksum'
  | 'InvalidVersionBytes'
  | 'UnsupportedFormat'
  | 'InvalidKey'
  | 'InvalidEncoding';

export class ExtendedKeyError extends WalletError {
  public readonly code: ExtendedKeyErrorCode;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(code: ExtendedKeyErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'ExtendedKeyError';
    this.code = code;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type PrivateKeyErrorCode =
  | 'InvalidByteLength'
  | 'InvalidChecksum'
  | 'InvalidPrefix'
  | 'InvalidKey'
  | 'InvalidEncoding';

export class PrivateKeyError extends WalletError {
  public readonly code: PrivateKeyErrorCode;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(code: PrivateKeyErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'PrivateKeyError';
    this.code = code;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export class PublicKeyError extends WalletError {
  public readonly code = 'InvalidKey' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublicKeyError';
  }
}

export type AddressErrorCode =
  | 'InvalidCharacterLength'
  | 'InvalidByteLength'
  | 'InvalidChecksum'
  | 'InvalidPrefix'
  | 'InvalidAddress'
  | 'IncompatibleFormats'
  | 'InvalidEncoding';

export class AddressError extends WalletError {
  public readonly code: AddressErrorCode;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(code: AddressErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'AddressError';
    this.code = code;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type WitnessProgramErrorCode =
  | 'MismatchedProgramLength'
  | 'InvalidProgramLength'
  | 'InvalidVersion'
  | 'InvalidProgramLengthForVersion';

export class WitnessProgramError extends WalletError {
  public readonly code: WitnessProgramErrorCode;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(code: WitnessProgramErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = 'WitnessProgramError';
    this.code = code;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type TransactionErrorCode =
  | 'InvalidSegwitFlag'
  | 'InvalidVariableSizeInteger'
  | 'InvalidAmount'
  | 'UnexpectedEndOfInput'
  | 'TrailingBytes'
  | 'MissingOutpointScriptPublicKey'
  | 'MissingOutpointAmount'
  | 'InvalidInputs'
  | 'InvalidScriptPubKey'
  | 'InvalidTransactionId'
  | 'InvalidOutpointIndex'
  | 'InvalidSighashType'
  | 'InvalidEncoding';

export class TransactionError extends WalletError {
  public readonly code: TransactionErrorCode;
  public readonly inputIndex?: number;
  public readonly expected?: string;
  public readonly found?: string;

  constructor(
    code: TransactionErrorCode,
    message: string,
    details: ErrorDetails & { inputIndex?: number } = {},
  ) {
    super(message, { cause: details.cause });
    this.name = 'TransactionError';
    this.code = code;
    this.inputIndex = details.inputIndex;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type AmountErrorCode = 'AmountOutOfBounds' | 'InvalidAmount';

export class AmountError extends WalletError {
  public readonly code: AmountErrorCode;

  constructor(code: AmountErrorCode, message: string) {
    super(message);
    this.name = 'AmountError';
    this.code = code;
  }
}

export class NetworkMismatchError extends WalletError {
  public expected: string;
  public actual: string;

  constructor(expected: string, actual: string) {
    super(`Network mismatch: expected ${expected}, got ${actual}`);
    this.name = 'NetworkMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigError extends WalletError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration validation failed: ${problems.join(', ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
