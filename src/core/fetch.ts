import { Agent, fetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpGetOptions {
  accept: string;
  timeoutMs: number;
}

export type HttpGet = (url: string, options: HttpGetOptions) => Promise<HttpResponseLike>;

export interface HttpClientConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
}

export function createHttpGet(config: HttpClientConfig): HttpGet {
  return async (url, options) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "user-agent": config.userAgent,
          accept: options.accept,
        },
        dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });
      // read the body before the timer is cleared so a stalled body also aborts
      const body = await response.arrayBuffer();
      return {
        ok: response.ok,
        status: response.status,
        text: async () => Buffer.from(body).toString("utf-8"),
        arrayBuffer: async () => body,
      };
    } finally {
      clearTimeout(timeout);
    }
  };
}

export async function fetchHtml(httpGet: HttpGet, url: string, timeoutMs: number): Promise<string> {
  const response = await httpGet(url, { accept: "text/html,application/xhtml+xml", timeoutMs });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} while fetching ${url}`);
  }
  return response.text();
}

export async function fetchBinary(httpGet: HttpGet, url: string, timeoutMs: number): Promise<Uint8Array> {
  const response = await httpGet(url, { accept: "application/pdf,*/*", timeoutMs });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} while downloading ${url}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}
