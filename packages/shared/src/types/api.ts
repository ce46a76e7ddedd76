export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

export function createSuccessResponse<T>(data: T): ApiSuccess<T> {
  return { success: true, data };
}

export type FlashLevel = 'success' | 'info' | 'warning' | 'error';

export interface FlashMessage {
  level: FlashLevel;
  message: string;
}
