export class SupabaseContainerError extends Error {
  override readonly name: string = 'SupabaseContainerError';

  constructor(
    message = 'unknown error',
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaInitError extends SupabaseContainerError {
  override readonly name = 'SchemaInitError';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
