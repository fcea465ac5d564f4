import type { RequestLogger } from "../observability/logger";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      logger?: RequestLogger;
    }
  }
}

export {};
