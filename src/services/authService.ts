// src/services/authService.ts
import { UserRecord } from "../domain/types";
import { createToken } from "../middleware/auth";
import { ConflictError, UnauthorizedError, ValidationError } from "../utils/httpErrors";
import { hashPassword, isLegacyHash, verifyPassword } from "./passwords";
import { UserRepository } from "./store";

export interface AuthSettings {
  jwtSecret: string;
  jwtExpiresIn: string;
  jwtRememberExpiresIn: string;
  bcryptRounds: number;
}

export interface LoginResult {
  token: string;
  tokenType: "Bearer";
  expiresIn: string;
  username: string;
}

const ACCOUNT_EXISTS = "An account already exists. Log in instead.";

export type CreateUserResult = "created" | "exists";

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly settings: AuthSettings
  ) {}

  async needsSetup(): Promise<boolean> {
    return (await this.users.count()) === 0;
  }

  async createUser(username: string, password: string): Promise<CreateUserResult> {
    const user = await this.newUserRecord(username, password);
    return (await this.users.create(user)) ? "created" : "exists";
  }

  /** Only allowed while the user table is empty. */
  async createFirstUser(username: string, password: string): Promise<string> {
    if (!(await this.needsSetup())) {
      throw new ConflictError(ACCOUNT_EXISTS);
    }
    const user = await this.newUserRecord(username, password);
    // the insert re-checks for an empty table, so concurrent setups create one account
    if (!(await this.users.createIfNone(user))) {
      throw new ConflictError(ACCOUNT_EXISTS);
    }
    console.log(`[auth] First-time setup: created user ${user.username}`);
    return user.username;
  }

  /**
   * Creates the configured account when nobody can log in yet.
   * Returns the username when an account was created.
   */
  async bootstrapAdmin(username?: string, password?: string): Promise<string | null> {
    if (!username || !password) return null;
    if (!(await this.needsSetup())) return null;
    return this.createFirstUser(username, password);
  }

  private async newUserRecord(username: string, password: string): Promise<UserRecord> {
    const name = username.trim();
    if (!name || !password.trim()) {
      throw new ValidationError("Username and password are required.");
    }
    return { username: name, passwordHash: await hashPassword(password, this.settings.bcryptRounds) };
  }

  async login(username: string, password: string, rememberMe: boolean = false): Promise<LoginResult> {
    const name = username.trim();
    const user = await this.users.findByUsername(name);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      console.warn(`[auth] Failed login for "${name}"`);
      throw new UnauthorizedError("Invalid credentials");
    }

    if (isLegacyHash(user.passwordHash)) {
      await this.users.updatePassword(name, await hashPassword(password, this.settings.bcryptRounds));
      console.log(`[auth] Upgraded legacy password hash for ${name}`);
    }

    const expiresIn = rememberMe ? this.settings.jwtRememberExpiresIn : this.settings.jwtExpiresIn;
    return {
      token: createToken(name, this.settings.jwtSecret, expiresIn),
      tokenType: "Bearer",
      expiresIn,
      username: name,
    };
  }

  async changePassword(username: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.users.findByUsername(username);
    if (!user || !(await verifyPassword(currentPassword, user.passwordHash))) {
      throw new UnauthorizedError("Current password is incorrect");
    }
    if (!newPassword.trim()) {
      throw new ValidationError("New password is required.");
    }
    await this.users.updatePassword(username, await hashPassword(newPassword, this.settings.bcryptRounds));
    console.log(`[auth] Password changed for ${username}`);
  }
}
