import { FixtureError } from "./errors.js";
import type { BookingFixture, BookingPayload } from "./types.js";

export const UPDATED_FIRST_NAME = "UpdatedName";
export const UPDATED_LAST_NAME = "UpdatedLastName";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const DEFAULT_FIXTURE_INPUT: BookingFixture = {
  firstName: "Ebrahim",
  lastName: "Hossain",
  totalPrice: 100,
  depositPaid: true,
  stayDates: { checkin: "2023-01-01", checkout: "2023-01-05" },
  extras: "Breakfast",
};

/**
 * Validates and freezes a booking fixture. The returned object and its
 * nested dates are immutable; use {@link withNames} to derive a copy.
 */
export function createFixture(input: BookingFixture = DEFAULT_FIXTURE_INPUT): BookingFixture {
  if (!Number.isFinite(input.totalPrice) || input.totalPrice < 0) {
    throw new FixtureError(`totalPrice must be a non-negative number, got ${input.totalPrice}`);
  }

  const { checkin, checkout } = input.stayDates;
  for (const [label, value] of [["checkin", checkin], ["checkout", checkout]] as const) {
    if (!ISO_DATE.test(value) || Number.isNaN(Date.parse(value))) {
      throw new FixtureError(`${label} must be an ISO date (YYYY-MM-DD), got "${value}"`);
    }
  }
  // Fixed-width ISO dates compare correctly as strings
  if (checkin > checkout) {
    throw new FixtureError(`checkin ${checkin} is after checkout ${checkout}`);
  }

  return Object.freeze({
    firstName: input.firstName,
    lastName: input.lastName,
    totalPrice: input.totalPrice,
    depositPaid: input.depositPaid,
    stayDates: Object.freeze({ checkin, checkout }),
    extras: input.extras,
  });
}

export function withNames(
  fixture: BookingFixture,
  firstName: string,
  lastName: string,
): BookingFixture {
  return createFixture({ ...fixture, firstName, lastName });
}

export function toPayload(fixture: BookingFixture): BookingPayload {
  return {
    firstname: fixture.firstName,
    lastname: fixture.lastName,
    totalprice: fixture.totalPrice,
    depositpaid: fixture.depositPaid,
    bookingdates: {
      checkin: fixture.stayDates.checkin,
      checkout: fixture.stayDates.checkout,
    },
    additionalneeds: fixture.extras,
  };
}
