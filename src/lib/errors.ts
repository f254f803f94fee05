/**
 * Fatal error classes for the weekly report run
 *
 * Every error here aborts the run. Recoverable conditions (a tenant with no
 * resolvable recipients, a no-data tenant without an explicit mapping) are
 * recorded as skips in the notification plan instead.
 */

/**
 * Thrown when the environment does not describe a runnable job
 */
export class ConfigurationError extends Error {
  public readonly code = 'CONFIGURATION_ERROR';

  constructor(public readonly issues: string[]) {
    super(`Invalid report configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      issues: this.issues,
    };
  }
}

/**
 * Thrown when the recipient map cannot be fetched or is not a JSON object.
 * Never downgraded to an empty map.
 */
export class RecipientMapError extends Error {
  public readonly code = 'RECIPIENT_MAP_ERROR';

  constructor(
    public readonly location: string,
    public readonly reason: string,
    public override readonly cause?: unknown
  ) {
    super(`Failed to load recipient map from ${location}: ${reason}`);
    this.name = 'RecipientMapError';
    Object.setPrototypeOf(this, RecipientMapError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      location: this.location,
      reason: this.reason,
    };
  }
}

export type StorageOperation = 'listChildPrefixes' | 'listObjectsWithSuffix' | 'getObject';

/**
 * Thrown when a listing or fetch against the object store fails
 */
export class StorageError extends Error {
  public readonly code = 'STORAGE_ERROR';

  constructor(
    public readonly operation: StorageOperation,
    public readonly bucket: string,
    public readonly path: string,
    public override readonly cause?: unknown
  ) {
    super(
      `Storage ${operation} failed for s3://${bucket}/${path}` +
        (cause instanceof Error ? `: ${cause.message}` : '')
    );
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      operation: this.operation,
      bucket: this.bucket,
      path: this.path,
    };
  }
}

/**
 * Thrown when every configured relay host rejected a notification
 */
export class DeliveryError extends Error {
  public readonly code = 'DELIVERY_ERROR';

  constructor(
    public readonly subject: string,
    public readonly errors: string[]
  ) {
    super(`All SMTP hosts failed for "${subject}". ${errors.join(' | ')}`);
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      subject: this.subject,
      errors: this.errors,
    };
  }
}
