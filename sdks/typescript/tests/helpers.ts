export interface RecordedCall {
  url: string;
  init?: RequestInit;
  // header values as fetch would send them, after Headers normalization
  sentHeaders: Record<string, string>;
}

export function recordingTransport(respond: () => Response = () => new Response("{}", { status: 200 })) {
  const calls: RecordedCall[] = [];
  const transport: typeof fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const sentHeaders: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, name) => {
      sentHeaders[name] = value;
    });
    calls.push({ url: String(input), init, sentHeaders });
    return respond();
  };
  return { calls, transport };
}

export function jsonResponse(body: string, status = 200, headers?: Record<string, string>): () => Response {
  return () => new Response(body, { status, headers });
}
