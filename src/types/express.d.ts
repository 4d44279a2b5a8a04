export {};

declare global {
  namespace Express {
    interface Request {
      /** 요청 추적 ID (gateway 미들웨어에서 설정) */
      requestId?: string;
    }
  }
}
