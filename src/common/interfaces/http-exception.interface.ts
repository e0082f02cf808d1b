// Body of every error response
export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;         // domain error code, or the HTTP status name
  timestamp?: string;
  path?: string;
}
