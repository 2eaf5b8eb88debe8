// Request fields set by our own middleware.
declare global {
  namespace Express {
    interface Request {
      /** Set by requestIdMiddleware and echoed as X-Request-Id. */
      id: string;
    }
  }
}

export {};
