declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      // Set by requireUser from the `user-id` header.
      userId?: string;
    }
  }
}

export {};
