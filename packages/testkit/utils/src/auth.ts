export type AuthVerdict = "ok" | "unauthorized" | "forbidden";

export interface AuthState {
  /** Reads need credentials too (writes always do). */
  requireForReads: boolean;
  token: string;
  username: string;
  password: string;
  /** Credentials are accepted but lack permission. */
  readOnly: boolean;
}

export const defaultAuthState: AuthState = {
  requireForReads: false,
  token: "test-token",
  username: "maintainer",
  password: "test-password",
  readOnly: false,
};

export class AuthGates {
  state: AuthState;
  constructor(initial?: Partial<AuthState>) {
    this.state = { ...defaultAuthState, ...(initial || {}) };
  }

  check(authorization: string | undefined, write = false): AuthVerdict {
    if (!authorization) {
      return write || this.state.requireForReads ? "unauthorized" : "ok";
    }
    if (!this.matches(authorization)) return "unauthorized";
    if (write && this.state.readOnly) return "forbidden";
    return "ok";
  }

  set<K extends keyof AuthState>(key: K, value: AuthState[K]) {
    this.state[key] = value;
  }

  private matches(authorization: string): boolean {
    const [scheme, value = ""] = authorization.split(" ", 2);
    if (scheme === "Token") return value === this.state.token;
    if (scheme === "Basic") {
      const decoded = Buffer.from(value, "base64").toString("utf8");
      return decoded === `${this.state.username}:${this.state.password}`;
    }
    return false;
  }
}
