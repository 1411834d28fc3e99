import type { BookingClient } from "../http/booking-client.js";
import { maskToken } from "../http/booking-client.js";
import type { Credentials } from "../config/types.js";
import { ContractViolation, PreconditionUnmet, UnexpectedStatus } from "./errors.js";
import { UPDATED_FIRST_NAME, UPDATED_LAST_NAME, toPayload, withNames } from "./fixture.js";
import type { HttpExchange, RunState } from "./types.js";

export interface StepContext {
  client: BookingClient;
  state: RunState;
  credentials: Credentials;
}

export interface SuiteStep {
  name: string;
  title: string;
  /** Returns a skip reason when the run state this step needs is missing. */
  precondition?: (state: RunState) => string | undefined;
  /** Resolves with an optional detail line on success; throws on failure. */
  run(ctx: StepContext): Promise<string | void>;
}

export const SKIP_NO_TOKEN = "no authentication token";
export const SKIP_NO_BOOKING = "no booking ID available (creation likely failed)";
export const SKIP_NO_BOOKING_OR_TOKEN = "missing booking ID or token";

const requireToken = (state: RunState) => (state.authToken ? undefined : SKIP_NO_TOKEN);
const requireBooking = (state: RunState) =>
  state.resourceId !== undefined ? undefined : SKIP_NO_BOOKING;
const requireBookingAndToken = (state: RunState) =>
  state.resourceId !== undefined && state.authToken ? undefined : SKIP_NO_BOOKING_OR_TOKEN;

export const checkAvailability: SuiteStep = {
  name: "check_availability",
  title: "API availability check",
  async run({ client }) {
    const res = await client.ping();
    expectStatus(res, 200, "API not reachable");
  },
};

export const authenticate: SuiteStep = {
  name: "authenticate",
  title: "Authentication",
  async run({ client, state, credentials }) {
    const res = await client.authenticate(credentials);
    expectStatus(res, 200, "Auth failed");

    const token = bodyRecord(res)?.token;
    if (typeof token !== "string" || token.length === 0) {
      throw new ContractViolation("No token in response");
    }
    state.authToken = token;
    return `token ${maskToken(token)}`;
  },
};

export const createResource: SuiteStep = {
  name: "create_booking",
  title: "Booking creation",
  precondition: requireToken,
  async run({ client, state }) {
    const res = await client.createBooking(toPayload(state.resourceFixture));
    expectStatus(res, 200, "Create booking failed");

    const id = bodyRecord(res)?.bookingid;
    if (typeof id !== "number" || !Number.isInteger(id) || id <= 0) {
      throw new ContractViolation(`No bookingid in response: ${renderBody(res)}`);
    }
    state.resourceId = id;
    return `bookingid=${id}`;
  },
};

export const retrieveResource: SuiteStep = {
  name: "get_booking",
  title: "Get booking",
  precondition: requireBooking,
  async run({ client, state }) {
    const id = definedId(state);
    const res = await client.getBooking(id);
    expectStatus(res, 200, "Get booking failed");

    const expected = state.resourceFixture.firstName;
    expectFirstName(res, expected, "Firstname doesn't match");
    return `firstname="${expected}"`;
  },
};

export const updateResource: SuiteStep = {
  name: "update_booking",
  title: "Update booking",
  precondition: requireBookingAndToken,
  async run({ client, state }) {
    const id = definedId(state);
    const updated = withNames(state.resourceFixture, UPDATED_FIRST_NAME, UPDATED_LAST_NAME);
    const res = await client.updateBooking(id, toPayload(updated), definedToken(state));
    expectStatus(res, 200, "Update failed");

    expectFirstName(res, UPDATED_FIRST_NAME, "Firstname not updated");
    return `firstname="${UPDATED_FIRST_NAME}"`;
  },
};

export const deleteResource: SuiteStep = {
  name: "delete_booking",
  title: "Delete booking",
  precondition: requireBookingAndToken,
  async run({ client, state }) {
    const id = definedId(state);
    const res = await client.deleteBooking(id, definedToken(state));
    expectStatus(res, 201, "Delete failed");

    // Checked once, straight after the delete; no polling for eventual consistency
    const check = await client.getBooking(id);
    if (check.status === 200) {
      throw new ContractViolation(`Booking ${id} still exists after deletion`);
    }
    expectStatus(check, 404, "Deletion check failed");
    return "404 confirmed";
  },
};

/** The fixed step order. Later steps depend on state written by earlier ones. */
export const BOOKING_FLOW_STEPS: readonly SuiteStep[] = [
  checkAvailability,
  authenticate,
  createResource,
  retrieveResource,
  updateResource,
  deleteResource,
];

function expectStatus(res: HttpExchange, expected: number, context: string): void {
  if (res.status !== expected) {
    throw new UnexpectedStatus(expected, res.status ?? 0, context);
  }
}

function expectFirstName(res: HttpExchange, expected: string, context: string): void {
  const actual = bodyRecord(res)?.firstname;
  if (actual !== expected) {
    throw new ContractViolation(
      `${context}: expected firstname "${expected}", got ${JSON.stringify(actual ?? null)}`,
    );
  }
}

function bodyRecord(res: HttpExchange): Record<string, unknown> | undefined {
  const body = res.responseBody;
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  return Object.fromEntries(Object.entries(body));
}

function renderBody(res: HttpExchange): string {
  return typeof res.responseBody === "string" ? res.responseBody : JSON.stringify(res.responseBody);
}

function definedId(state: RunState): number {
  if (state.resourceId === undefined) throw new PreconditionUnmet(SKIP_NO_BOOKING);
  return state.resourceId;
}

function definedToken(state: RunState): string {
  if (!state.authToken) throw new PreconditionUnmet(SKIP_NO_TOKEN);
  return state.authToken;
}
