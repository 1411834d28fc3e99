import type { SuiteErrorKind } from "./errors.js";

export interface StayDates {
  checkin: string;
  checkout: string;
}

export interface BookingFixture {
  readonly firstName: string;
  readonly lastName: string;
  readonly totalPrice: number;
  readonly depositPaid: boolean;
  readonly stayDates: Readonly<StayDates>;
  readonly extras: string;
}

/** Booking as it travels over the wire. Field names are fixed by the API. */
export interface BookingPayload {
  firstname: string;
  lastname: string;
  totalprice: number;
  depositpaid: boolean;
  bookingdates: StayDates;
  additionalneeds: string;
}

export interface RunState {
  authToken?: string;
  resourceId?: number;
  readonly resourceFixture: BookingFixture;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpExchange {
  method: HttpMethod;
  url: string;
  requestBody?: unknown;
  headers?: Record<string, string>;
  /** Absent when the request never got a response. */
  status?: number;
  responseBody?: unknown;
  durationMs: number;
}

export type StepVerdict = "pass" | "fail" | "skip";

export interface StepResult {
  name: string;
  title: string;
  verdict: StepVerdict;
  reason?: string;
  errorKind?: SuiteErrorKind;
  /** Short human note on success, e.g. the created booking id. */
  detail?: string;
  exchanges: HttpExchange[];
  durationMs: number;
}

export type SuiteVerdict = "pass" | "fail" | "partial";

export interface SuiteReport {
  title: string;
  timestamp: string;
  baseUrl: string;
  steps: StepResult[];
  verdict: SuiteVerdict;
  summary: string;
  durationMs: number;
}
