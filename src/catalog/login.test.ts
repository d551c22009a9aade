import { describe, expect, it } from "vitest";
import { AuthError, FetchError } from "../core/errors";
import { quietLogger } from "../test/fakes";
import { loginWithRetry } from "./login";
import { CatalogAuthenticator, Credentials, Session } from "./types";

class ScriptedAuthenticator implements CatalogAuthenticator {
  readonly attempts: Credentials[] = [];
  private readonly outcomes: Array<Session | Error>;

  constructor(outcomes: Array<Session | Error>) {
    this.outcomes = outcomes;
  }

  async login(credentials: Credentials): Promise<Session> {
    this.attempts.push(credentials);
    const outcome = this.outcomes[this.attempts.length - 1];
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

describe("loginWithRetry", () => {
  const session: Session = { username: "student", cookie: "sid=abc" };

  it("returns the session after a rejected attempt", async () => {
    const authenticator = new ScriptedAuthenticator([new AuthError("rejected"), session]);
    const passwords = ["wrong", "test-secret"];

    const result = await loginWithRetry(
      authenticator,
      (attempt) => ({ username: "student", password: passwords[attempt - 1] }),
      3,
      quietLogger(),
    );

    expect(result).toEqual(session);
    expect(authenticator.attempts.map((credentials) => credentials.password)).toEqual(["wrong", "test-secret"]);
  });

  it("gives up with the last auth error after the attempt limit", async () => {
    const last = new AuthError("third rejection");
    const authenticator = new ScriptedAuthenticator([new AuthError("first"), new AuthError("second"), last, session]);

    await expect(
      loginWithRetry(authenticator, (attempt) => ({ username: "student", password: `wrong-${attempt}` }), 3, quietLogger()),
    ).rejects.toBe(last);
    expect(authenticator.attempts).toHaveLength(3);
  });

  it("does not resubmit credentials that were just rejected", async () => {
    const first = new AuthError("rejected");
    const authenticator = new ScriptedAuthenticator([first, session]);

    await expect(
      loginWithRetry(authenticator, () => ({ username: "student", password: "wrong" }), 3, quietLogger()),
    ).rejects.toBe(first);
    expect(authenticator.attempts).toEqual([{ username: "student", password: "wrong" }]);
  });

  it("does not retry errors other than auth errors", async () => {
    const authenticator = new ScriptedAuthenticator([new FetchError("offline", "https://catalog.test/login"), session]);

    await expect(
      loginWithRetry(authenticator, () => ({ username: "student", password: "test-secret" }), 3, quietLogger()),
    ).rejects.toBeInstanceOf(FetchError);
    expect(authenticator.attempts).toHaveLength(1);
  });

  it("makes at least one attempt", async () => {
    const authenticator = new ScriptedAuthenticator([session]);

    await expect(
      loginWithRetry(authenticator, () => ({ username: "student", password: "test-secret" }), 0, quietLogger()),
    ).resolves.toEqual(session);
  });
});
