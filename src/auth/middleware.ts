import { basicAuth } from "hono/basic-auth";
import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import type { AuthUser, UserStore } from "./users";

// Extend Hono context with user
declare module "hono" {
  interface ContextVariableMap {
    user: AuthUser;
  }
}

export const BASIC_REALM = "library";

function unauthorized(message: string): HTTPException {
  return new HTTPException(401, {
    message,
    res: new Response(
      JSON.stringify({ error: { code: "UNAUTHORIZED", message } }),
      {
        status: 401,
        headers: {
          "Content-Type": "application/json",
          "WWW-Authenticate": `Basic realm="${BASIC_REALM}"`,
        },
      },
    ),
  });
}

// Required auth - returns 401 unless valid Basic credentials are sent
export function requireBasicAuth(users: UserStore) {
  const verify = basicAuth({
    realm: BASIC_REALM,
    verifyUser: async (username, password, c) => {
      const user = await users.authenticate(username, password);
      if (user) c.set("user", user);
      return user !== null;
    },
  });

  return createMiddleware(async (c, next) => {
    let authenticated = false;

    try {
      await verify(c, async () => {
        authenticated = true;
        await next();
      });
    } catch (err) {
      // Only rewrite the challenge; errors from downstream handlers pass through
      if (authenticated || !(err instanceof HTTPException) || err.status !== 401) {
        throw err;
      }
      throw unauthorized(c.req.header("authorization") ? "Invalid username or password" : "Authorization required");
    }
  });
}
