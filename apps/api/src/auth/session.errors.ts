export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed token or signature mismatch. */
export class InvalidTokenError extends SessionError {}

/** Login attempted with an empty user id or password. */
export class CredentialsMissingError extends SessionError {}
