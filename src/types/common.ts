export interface RequestContext {
  requestId: string;
  startTime: number;
  /** Aborted when the client connection closes before the response is written. */
  signal?: AbortSignal;
}

declare global {
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string | number;
    requestId: string;
  };
}

export interface HealthResponse {
  status: "ok" | "degraded";
  version: string;
  uptime: number;
  pendingTasks: number;
}
