export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class FileNotFoundError extends Error {
  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(
    public readonly kind: 'extension' | 'profile',
    public readonly id: string
  ) {
    super(`${kind === 'extension' ? 'Extension' : 'Profile'} not found: ${id}`);
    this.name = 'RecordNotFoundError';
  }
}

export class InvalidRecordError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'InvalidRecordError';
  }
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
