declare global {
  namespace Express {
    interface Request {
      callerId?: string;
    }
  }
}

export {};
