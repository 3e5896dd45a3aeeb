import { hashPassword, verifyPassword } from "./password";

export interface AuthUser {
  username: string;
  role: "librarian";
}

export interface UserStore {
  authenticate(username: string, password: string): Promise<AuthUser | null>;
}

interface StoredUser extends AuthUser {
  passwordHash: string;
}

/**
 * Accounts held in process memory. Passwords are hashed on creation and
 * never kept in clear text.
 */
export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, StoredUser>();
  private placeholderHash?: Promise<string>;

  static async withUser(username: string, password: string): Promise<InMemoryUserStore> {
    const store = new InMemoryUserStore();
    await store.addUser(username, password);
    return store;
  }

  async addUser(username: string, password: string): Promise<void> {
    const passwordHash = await hashPassword(password);
    this.users.set(username, { username, role: "librarian", passwordHash });
  }

  async authenticate(username: string, password: string): Promise<AuthUser | null> {
    const user = this.users.get(username);
    if (!user) {
      // Spend the same bcrypt work as for a known account
      this.placeholderHash ??= hashPassword("placeholder-password");
      await verifyPassword(password, await this.placeholderHash);
      return null;
    }

    const valid = await verifyPassword(password, user.passwordHash);
    return valid ? { username: user.username, role: user.role } : null;
  }
}
