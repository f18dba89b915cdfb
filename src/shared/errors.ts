export class NexusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DependencyMissingError extends NexusError {
  constructor(
    readonly missing: string[],
    readonly instructions: string[],
  ) {
    super(`Missing required dependencies: ${missing.join(', ')}`);
  }
}

export class LaunchUnavailableError extends NexusError {
  constructor(readonly fallbackCommand: string) {
    super('Unable to start monitoring automatically');
  }
}

export class InvalidIdentityError extends NexusError {}

export class ConfigError extends NexusError {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super(`Invalid config at ${filePath}: ${detail}`);
  }
}
