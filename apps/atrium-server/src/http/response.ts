/** Envelope every HTTP route answers with */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: string;
}

export function ok<T>(message: string, data?: T): ApiResponse<T> {
  return data === undefined ? { success: true, message } : { success: true, message, data };
}

export function fail(message: string, error?: string): ApiResponse<never> {
  return error === undefined ? { success: false, message } : { success: false, message, error };
}
