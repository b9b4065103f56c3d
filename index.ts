/**
 * pricing-fetch-schedules
 *
 * Composable schedules for fetching third-party pricing data: an algebra of
 * time predicates, a text form for configuration, and a minute-tick
 * scheduler that hands due fetches to the caller.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
