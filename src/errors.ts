export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * リクエストの値が範囲外、またはソート項目がホワイトリストにない
 */
export class ValidationError extends AppError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/**
 * クエリ実行の失敗。intent はログに出すクエリの目的（ユーザー入力は含めない）
 */
export class StoreError extends AppError {
  constructor(readonly intent: string, options?: ErrorOptions) {
    super(`Query failed: ${intent}`, 500, options);
  }
}

export class PoolExhaustionError extends AppError {
  constructor(readonly timeoutMs: number, options?: ErrorOptions) {
    super(`No database connection available within ${timeoutMs}ms`, 503, options);
  }
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}
