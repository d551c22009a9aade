import { AuthError } from "../core/errors";
import { Logger } from "../observability";
import { CatalogAuthenticator, Credentials, Session } from "./types";

export type CredentialsProvider = (attempt: number) => Promise<Credentials> | Credentials;

function sameCredentials(left: Credentials, right: Credentials): boolean {
  return left.username === right.username && left.password === right.password;
}

/**
 * Tries to log in up to `maxAttempts` times, asking the provider for
 * credentials on every attempt. Only `AuthError` is retried, and only while
 * the provider hands out credentials other than the ones just rejected; the
 * last `AuthError` is rethrown once the attempts run out.
 */
export async function loginWithRetry(
  authenticator: CatalogAuthenticator,
  credentialsFor: CredentialsProvider,
  maxAttempts: number,
  logger: Logger,
): Promise<Session> {
  const attempts = Math.max(1, maxAttempts);
  let lastError: AuthError | undefined;
  let rejected: Credentials | undefined;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const credentials = await credentialsFor(attempt);
    if (lastError && rejected && sameCredentials(credentials, rejected)) {
      logger.warn("login_credentials_unchanged", { username: credentials.username, attempt });
      throw lastError;
    }
    try {
      const session = await authenticator.login(credentials);
      logger.info("login_ok", { username: credentials.username, attempt });
      return session;
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      lastError = error;
      rejected = credentials;
      logger.warn("login_rejected", { username: credentials.username, attempt, maxAttempts: attempts });
    }
  }

  throw lastError ?? new AuthError("Login failed");
}
