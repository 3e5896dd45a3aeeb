export { hashPassword, verifyPassword } from "./password";
export { InMemoryUserStore, type AuthUser, type UserStore } from "./users";
export { requireBasicAuth, BASIC_REALM } from "./middleware";
