export { assert, describe, test } from "./nodeTest.js";
export { assertApprox } from "./approx.js";
export { type ManualClock, createManualClock } from "./manualClock.js";
