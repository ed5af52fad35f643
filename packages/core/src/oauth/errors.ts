/**
 * Errors raised by the OAuth sync layer.
 */

export class UnsupportedProviderError extends Error {
  constructor(readonly provider: string) {
    super(`Unsupported OAuth provider: ${provider}`);
    this.name = 'UnsupportedProviderError';
  }
}

export class NoLinkedAccountError extends Error {
  constructor(
    readonly username: string,
    readonly provider: string
  ) {
    super(`User "${username}" has no linked ${provider} account`);
    this.name = 'NoLinkedAccountError';
  }
}

/**
 * A vendor response whose body does not have the shape the sync expects.
 */
export class MalformedResponseError extends Error {
  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = 'MalformedResponseError';
  }

  static invalidJson(url: string): MalformedResponseError {
    return new MalformedResponseError(`Response from ${url} is not valid JSON`, url);
  }

  static notAList(url: string): MalformedResponseError {
    return new MalformedResponseError(`Expected a JSON array from ${url}`, url);
  }

  static notAnObject(url: string): MalformedResponseError {
    return new MalformedResponseError(`Expected a JSON object from ${url}`, url);
  }

  static invalidPayload(url: string, details: string): MalformedResponseError {
    return new MalformedResponseError(`Unexpected payload from ${url}: ${details}`, url);
  }
}

/**
 * User-facing failure of an import phase. The message asks the user to reconnect.
 */
export class RemoteSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteSyncError';
  }

  static repositories(vendor: string, cause?: unknown): RemoteSyncError {
    return new RemoteSyncError(
      `Could not sync your ${vendor} repositories, try reconnecting your account`,
      { cause }
    );
  }

  static organizations(vendor: string, cause?: unknown): RemoteSyncError {
    return new RemoteSyncError(
      `Could not sync your ${vendor} organizations, try reconnecting your account`,
      { cause }
    );
  }

  static teamRepositories(vendor: string, cause?: unknown): RemoteSyncError {
    return new RemoteSyncError(
      `Could not sync your ${vendor} team repositories, try reconnecting your account`,
      { cause }
    );
  }
}

export class InvalidRepoUrlError extends Error {
  constructor(
    readonly url: string,
    readonly vendor: string
  ) {
    super(`Cannot derive ${vendor} owner/repo from "${url}"`);
    this.name = 'InvalidRepoUrlError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
