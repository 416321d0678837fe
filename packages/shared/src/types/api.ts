export interface SuccessResponse {
  success: true;
}

export interface ErrorResponse {
  error: string;
  request_id?: string;
  details?: unknown;
}

export interface HealthResponse {
  status: 'ok' | 'error';
  database: 'connected' | 'disconnected';
  storage: 'connected' | 'disconnected';
}
