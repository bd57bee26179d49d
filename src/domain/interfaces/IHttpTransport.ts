import { Readable } from 'stream';

/**
 * A single GET, optionally ranged
 */
export interface TransferRequest {
  url: string;
  userAgent: string;
  /** Ask for bytes from this offset to the end */
  rangeStart?: number;
  signal?: AbortSignal;
}

/**
 * Parsed `Content-Range: bytes start-end/total`
 */
export interface ContentRange {
  start: number;
  end: number;
  /** Undefined when the server sent `*` */
  total?: number;
}

/**
 * A 2xx response whose body has not been read yet. Destroying the body
 * releases the connection.
 */
export interface TransferResponse {
  status: number;
  statusText: string;
  contentLength?: number;
  contentRange?: ContentRange;
  body: Readable;
}

export interface ProbeRequest {
  url: string;
  userAgent: string;
  signal?: AbortSignal;
}

export interface RangeProbe {
  supported: boolean;
  contentLength?: number;
}

/**
 * Network boundary of the engine
 */
export interface IHttpTransport {
  /**
   * Issue the GET. Rejects with HttpStatusError for non-2xx statuses;
   * other failures are whatever the underlying client throws.
   */
  open(request: TransferRequest): Promise<TransferResponse>;

  /**
   * Ask whether the resource advertises byte ranges. Never rejects; a
   * failed probe reports `supported: false`.
   */
  probeRangeSupport(request: ProbeRequest): Promise<RangeProbe>;
}
