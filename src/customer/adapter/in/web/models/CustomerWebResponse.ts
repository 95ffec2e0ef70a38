/**
 * Web層の共通レスポンス形式
 */
export interface CustomerWebResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code: string;
    details?: Record<string, unknown>;
  };
}
