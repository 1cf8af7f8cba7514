export { createManualClock, type ManualClock } from "./clock.js";
export { assert, describe, test } from "./nodeTest.js";
