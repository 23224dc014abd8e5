import * as http from "node:http";
import * as https from "node:https";

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export interface HttpGetOptions {
  followRedirects?: boolean;
}

export interface HttpTransport {
  get(url: string, options?: HttpGetOptions): Promise<HttpResponse>;
}

export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// Certificate validation stays off: the trust material this tool installs does
// not exist on the machine yet.
const insecureAgent = new https.Agent({ rejectUnauthorized: false });

function requestOnce(url: URL): Promise<{ status: number; location?: string; body: Buffer }> {
  return new Promise((resolve, reject) => {
    const onResponse = (response: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      response.on("data", (chunk: Buffer) => chunks.push(chunk));
      response.on("end", () =>
        resolve({
          status: response.statusCode ?? 0,
          location: response.headers.location,
          body: Buffer.concat(chunks)
        })
      );
      response.on("error", reject);
    };

    const request =
      url.protocol === "https:"
        ? https.get(url, { agent: insecureAgent, headers: { "user-agent": "proxy-certs/0.1" } }, onResponse)
        : http.get(url, { headers: { "user-agent": "proxy-certs/0.1" } }, onResponse);
    request.on("error", reject);
  });
}

export function createInsecureTransport(): HttpTransport {
  return {
    async get(url, options = {}) {
      let target = new URL(url);
      for (let hop = 0; ; hop += 1) {
        const response = await requestOnce(target);
        if (
          !options.followRedirects ||
          !REDIRECT_STATUSES.has(response.status) ||
          !response.location ||
          hop >= MAX_REDIRECTS
        ) {
          return { status: response.status, body: response.body };
        }
        target = new URL(response.location, target);
      }
    }
  };
}
