/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { StreamService } from "../services/stream-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Ledger service shared by all requests */
    service: StreamService;

    /** Caller identity, when the request carried one (set by identity middleware) */
    auth: AuthContext | undefined;
  };
}
