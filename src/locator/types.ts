/**
 * A token wrapper that keeps the secret out of logs, `JSON.stringify` and
 * string interpolation. Call `reveal()` where the raw value is needed.
 */
export class Credential {
  readonly #token: string;

  constructor(token: string) {
    this.#token = token;
  }

  reveal(): string {
    return this.#token;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * An opened filesystem rooted at a local directory, such as another `GitFS`.
 */
export interface FilesystemHandle {
  getSystemPath(path: string): string;
}

export type RepositoryKind = 'remote' | 'local';

export interface RepositorySource {
  readonly kind: RepositoryKind;
  /** What is handed to `git clone`: a URL without credentials or an absolute path. */
  readonly location: string;
  readonly name: string;
  readonly username?: string;
  readonly credential?: Credential;
}

/**
 * Supplies the fallback token when none is given explicitly.
 */
export type CredentialSource = () => string | undefined;

export type RepositoryInput = string | URL | FilesystemHandle;

export interface LocateOptions {
  credential?: string;
  username?: string;
  credentialSource?: CredentialSource;
  /** Base for relative local paths. Defaults to `process.cwd()`. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}
