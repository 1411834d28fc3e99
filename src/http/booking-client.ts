import axios, { type AxiosInstance } from "axios";
import type { Credentials } from "../config/types.js";
import { TransportError, describeError } from "../suite/errors.js";
import type { BookingPayload, HttpExchange, HttpMethod } from "../suite/types.js";

export type ExchangeRecorder = (exchange: HttpExchange) => void;

export interface BookingClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Thin axios wrapper over the booking API. Every call resolves with the
 * recorded exchange whatever the status code; only a missing response
 * (connection error, timeout) rejects, as a {@link TransportError}.
 */
export class BookingClient {
  readonly baseUrl: string;
  private options: BookingClientOptions;
  private http: AxiosInstance;
  private recorder?: ExchangeRecorder;

  constructor(options: BookingClientOptions, http?: AxiosInstance, recorder?: ExchangeRecorder) {
    this.baseUrl = options.baseUrl;
    this.options = options;
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { Accept: "application/json" },
        // Status checks belong to the steps
        validateStatus: () => true,
      });
    this.recorder = recorder;
  }

  /** Returns a client sharing this one's connection setup that reports every exchange to `recorder`. */
  scoped(recorder: ExchangeRecorder): BookingClient {
    return new BookingClient(this.options, this.http, recorder);
  }

  ping(): Promise<HttpExchange> {
    return this.request("GET", "/");
  }

  authenticate(credentials: Credentials): Promise<HttpExchange> {
    return this.request("POST", "/auth", {
      body: { username: credentials.username, password: credentials.password },
    });
  }

  createBooking(booking: BookingPayload): Promise<HttpExchange> {
    return this.request("POST", "/booking", { body: booking });
  }

  getBooking(id: number): Promise<HttpExchange> {
    return this.request("GET", `/booking/${id}`);
  }

  updateBooking(id: number, booking: BookingPayload, token: string): Promise<HttpExchange> {
    return this.request("PUT", `/booking/${id}`, {
      body: booking,
      headers: sessionCookie(token),
    });
  }

  deleteBooking(id: number, token: string): Promise<HttpExchange> {
    return this.request("DELETE", `/booking/${id}`, { headers: sessionCookie(token) });
  }

  private async request(
    method: HttpMethod,
    path: string,
    opts: { body?: unknown; headers?: Record<string, string> } = {},
  ): Promise<HttpExchange> {
    const url = `${this.baseUrl}${path}`;
    const exchange: HttpExchange = {
      method,
      url,
      requestBody: opts.body,
      headers: opts.headers ? maskHeaders(opts.headers) : undefined,
      durationMs: 0,
    };
    const start = Date.now();

    try {
      const response = await this.http.request<unknown>({
        method,
        url: path,
        data: opts.body,
        headers: opts.headers,
      });
      exchange.status = response.status;
      exchange.responseBody = response.data;
    } catch (err) {
      throw new TransportError(method, url, describeError(err));
    } finally {
      exchange.durationMs = Date.now() - start;
      this.recorder?.(exchange);
    }

    return exchange;
  }
}

/** The API reads the session token from a cookie, not an Authorization header. */
export function sessionCookie(token: string): Record<string, string> {
  return { Cookie: `token=${token}` };
}

export function maskToken(token: string): string {
  return token.length > 5 ? `${token.slice(0, 5)}...` : "***";
}

function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    masked[name] =
      name.toLowerCase() === "cookie"
        ? value.replace(/token=([^;]*)/, (_, token: string) => `token=${maskToken(token)}`)
        : value;
  }
  return masked;
}
