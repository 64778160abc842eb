// src/lib/errors.ts

/** キャンバス操作の前提違反（存在しない ID、重複、未対応タイプなど） */
export class CanvasError extends Error {
  override readonly name = "CanvasError";
}

/** LLM 応答が JSON として解釈できない */
export class ModelResponseError extends Error {
  override readonly name = "ModelResponseError";
  constructor(message: string, readonly raw?: string) {
    super(message);
  }
}

/** Express のエラーミドルウェアでそのまま返すエラー */
export class HttpError extends Error {
  override readonly name = "HttpError";
  constructor(
    readonly status: number,
    readonly body: Record<string, unknown>,
  ) {
    super(typeof body.error === "string" ? body.error : `HTTP ${status}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
