import { CliError, EXIT_CODES } from "./errors.js";
import type { HttpTransport } from "./http.js";

export const MOZILLA_ROOTS_URL =
  "https://ccadb-public.secure.force.com/mozilla/IncludedRootsPEMTxt?TrustBitsInclude=Websites";

/** Status codes `/locallogin` answers with when the tenant is behind the proxy. */
export const REACHABLE_STATUSES: ReadonlySet<number> = new Set([200, 302, 307]);

export type CertSource = "tenant-ca" | "tenant-org" | "mozilla-roots";

export interface Download {
  source: CertSource;
  url: string;
  body: Buffer;
}

export class TenantClient {
  constructor(
    private readonly tenantName: string,
    private readonly orgKey: string,
    private readonly transport: HttpTransport
  ) {}

  get loginUrl() {
    return `https://${this.tenantName}/locallogin`;
  }

  sourceUrl(source: CertSource) {
    const key = encodeURIComponent(this.orgKey);
    if (source === "tenant-ca") {
      return `https://addon-${this.tenantName}/config/ca/cert?orgkey=${key}`;
    }
    if (source === "tenant-org") {
      return `https://addon-${this.tenantName}/config/org/cert?orgkey=${key}`;
    }
    return MOZILLA_ROOTS_URL;
  }

  /** Status of the login probe, or 0 when no response arrived. */
  async probe(): Promise<number> {
    try {
      const response = await this.transport.get(this.loginUrl);
      return response.status;
    } catch {
      return 0;
    }
  }

  async assertReachable() {
    const status = await this.probe();
    if (!REACHABLE_STATUSES.has(status)) {
      throw new CliError(
        "TENANT_UNREACHABLE",
        `Tenant ${this.tenantName} is unreachable`,
        EXIT_CODES.TENANT_UNREACHABLE,
        { url: this.loginUrl, status_code: status, accepted: [...REACHABLE_STATUSES] }
      );
    }
    return status;
  }

  async download(source: CertSource): Promise<Download> {
    const url = this.sourceUrl(source);
    let status: number;
    let body: Buffer;
    try {
      const response = await this.transport.get(url, {
        followRedirects: source === "mozilla-roots"
      });
      status = response.status;
      body = response.body;
    } catch (error) {
      const message = error instanceof Error ? error.message : "request failed";
      throw new CliError("DOWNLOAD_FAILED", `Unable to download ${source}: ${message}`, EXIT_CODES.DOWNLOAD_FAILED, { url });
    }

    if (status < 200 || status >= 300) {
      throw new CliError("DOWNLOAD_FAILED", `Download of ${source} failed (${status})`, EXIT_CODES.DOWNLOAD_FAILED, {
        url,
        status_code: status
      });
    }
    return { source, url, body };
  }
}
