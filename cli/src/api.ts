/**
 * API client for the stock ledger server
 *
 * Thin fetch wrapper; failures come back as the server's error body.
 */

const BASE_URL = process.env.STOCKLEDGER_API_URL || 'http://127.0.0.1:3001';

/** Error body written by the server's error handler */
export interface ApiErrorBody {
  error: string;
  code?: string;
  details?: Array<{ path: string; message: string }>;
}

export type ApiResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: ApiErrorBody };

function toErrorBody(value: unknown, status: number): ApiErrorBody {
  if (typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string') {
    const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
    const details = 'details' in value && Array.isArray(value.details)
      ? value.details.filter(
          (d): d is { path: string; message: string } =>
            typeof d === 'object' && d !== null && typeof d.path === 'string' && typeof d.message === 'string'
        )
      : undefined;
    return { error: value.error, code, details };
  }
  return { error: `HTTP ${status}` };
}

export async function api<T = unknown>(
  path: string,
  options: { method?: string; body?: unknown } = {}
): Promise<ApiResponse<T>> {
  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: options.method || 'GET',
      headers: { 'Content-Type': 'application/json' },
      ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Connection failed: ${msg}`);
    console.error(`Is the server running at ${BASE_URL}?`);
    process.exit(1);
  }

  const contentType = res.headers.get('content-type') || '';
  if (!contentType.includes('application/json')) {
    return {
      ok: false,
      status: res.status,
      error: { error: `Non-JSON response (${res.status}): ${contentType}` },
    };
  }

  const body: unknown = await res.json();
  if (!res.ok) {
    return { ok: false, status: res.status, error: toErrorBody(body, res.status) };
  }
  return { ok: true, status: res.status, data: body as T };
}
