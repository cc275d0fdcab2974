/**
 * Error taxonomy for planning and transfer.
 *
 * Configuration and classification errors (UnregisteredBackendError,
 * UnsupportedRouteError, AddressKindError, PlanValidationError) are raised
 * before any I/O. The rest are raised by the transfer pipeline and are fatal
 * for the plan being executed.
 */

export class FerryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FerryError';
  }
}

/**
 * Backend unreachable. Raised before any side effect.
 */
export class ConnectionError extends FerryError {
  constructor(public readonly target: string) {
    super(`Failed to connect to storage for destination: ${target}`);
    this.name = 'ConnectionError';
  }
}

/**
 * Destination free space is known and smaller than the preview total.
 */
export class CapacityError extends FerryError {
  constructor(
    public readonly requiredBytes: number,
    public readonly availableBytes: number
  ) {
    super(
      `Insufficient space on destination. Required: ${requiredBytes} bytes, Available: ${availableBytes} bytes.`
    );
    this.name = 'CapacityError';
  }
}

export interface TransferErrorDetails {
  exitCode?: number;
  stderr?: string;
  cause?: unknown;
}

/**
 * The underlying copy mechanism failed. Partially written data is left in place.
 */
export class TransferError extends FerryError {
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, details: TransferErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TransferError';
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * A copied file does not match its source. sourceDigest is null when the
 * destination holds a file the source does not have.
 */
export class VerificationError extends FerryError {
  constructor(
    public readonly relativePath: string,
    public readonly sourceDigest: string | null,
    public readonly destinationDigest: string,
    public readonly algorithm: string
  ) {
    super(
      sourceDigest === null
        ? `Checksum verification failed [${algorithm}]: ${relativePath} has no source counterpart (dst=${destinationDigest})`
        : `Checksum mismatch [${algorithm}]: ${relativePath} (src=${sourceDigest}, dst=${destinationDigest})`
    );
    this.name = 'VerificationError';
  }
}

export class UnregisteredBackendError extends FerryError {
  constructor(
    public readonly key: string,
    public readonly registeredKeys: string[]
  ) {
    super(`Storage backend key not registered: ${key} (registered: ${registeredKeys.join(', ')})`);
    this.name = 'UnregisteredBackendError';
  }
}

/**
 * Neither or both sides of an rsync transfer are remote.
 */
export class UnsupportedRouteError extends FerryError {
  constructor(
    public readonly source: string,
    public readonly destination: string
  ) {
    super(`Unsupported transfer route for rsync backend: ${source} -> ${destination} (exactly one side must be remote)`);
    this.name = 'UnsupportedRouteError';
  }
}

export class AddressKindError extends FerryError {
  constructor(
    public readonly address: string,
    public readonly expected: string
  ) {
    super(`Address is not ${expected}: ${address}`);
    this.name = 'AddressKindError';
  }
}

export class PlanValidationError extends FerryError {
  constructor(public readonly issues: string[]) {
    super(`Invalid copy plan: ${issues.join('; ')}`);
    this.name = 'PlanValidationError';
  }
}
