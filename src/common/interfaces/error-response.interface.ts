import { ErrorSeverity } from '../errors';

export interface ErrorResponse {
  statusCode: number;
  error: {
    code: number;
    message: string;
    severity: ErrorSeverity;
  };
  timestamp: string;
  path?: string;
}
