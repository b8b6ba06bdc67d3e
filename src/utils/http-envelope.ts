export interface ApiError {
  code: string;
  message: string;
  [key: string]: unknown;
}

/** Every JSON body the API sends is wrapped in this shape. */
export interface ApiEnvelope<T = unknown> {
  ok: boolean;
  data: T | null;
  error: ApiError | null;
  meta: Record<string, unknown> | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function isApiEnvelope(value: unknown): value is ApiEnvelope {
  return (
    isRecord(value)
    && typeof value.ok === "boolean"
    && "data" in value
    && "error" in value
    && "meta" in value
  );
}

/** Stamps the request id into `meta`; anything that is not an envelope passes through. */
export function withRequestMeta(payload: unknown, requestId: string): unknown {
  if (!isApiEnvelope(payload)) {
    return payload;
  }

  return {
    ...payload,
    meta: {
      ...(payload.meta ?? {}),
      request_id: requestId,
    },
  };
}
