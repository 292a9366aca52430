export interface WebhookResponse {
  status: number;
  body: string;
}

export type WebhookTransport = (url: string, payload: unknown, timeoutMs: number) => Promise<WebhookResponse>;

/** POST a JSON payload. Rejects on network failure or when `timeoutMs` elapses. */
export const postWebhook: WebhookTransport = async (url, payload, timeoutMs) => {
  const res = await fetch(url, {
    method:  'POST',
    headers: { 'Content-Type': 'application/json' },
    body:    JSON.stringify(payload),
    signal:  AbortSignal.timeout(timeoutMs),
  });
  return { status: res.status, body: await res.text() };
};
