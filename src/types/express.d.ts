declare global {
  namespace Express {
    interface Request {
      operator?: {
        keyFingerprint: string;
      };
    }
  }
}

export {};
