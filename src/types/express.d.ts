declare global {
  namespace Express {
    interface Request {
      /** Set by requestIdMiddleware. */
      id?: string;
    }
  }
}

export {};
