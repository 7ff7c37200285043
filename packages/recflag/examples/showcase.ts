/**
 * recflag Showcase
 *
 * Self-documenting examples of declaring a configuration record, turning a
 * value of it into command-line arguments, and binding the same record to
 * a flag set so those arguments can be parsed back.
 *
 * Run:   npx tsx examples/showcase.ts
 */

import assert from "node:assert/strict";
import {
  Duration,
  ExclusionSet,
  FlagSet,
  InvalidDefaultError,
  bindFlags,
  inferRecord,
  record,
  resolveFlag,
  toArgs,
  unquote,
} from "../src/index.js";

// ============================================================================
// 1. DECLARE A RECORD - Field kinds are checked against property types
// ============================================================================

interface Worker {
  queue: string;
  concurrency: number;
  pollInterval: Duration;
  dryRun: boolean;
  apiToken: string;
}

const worker = record<Worker>("Worker")
  .field("queue", "string", { flag: "queue,queue to consume,default" })
  .field("concurrency", "int", { flag: "concurrency,parallel jobs,4" })
  .field("pollInterval", "duration", { json: "poll_interval", flag: ",how often to poll,30s" })
  .field("dryRun", "bool", { json: "dry_run" })
  .field("apiToken", "string", { json: "-" })
  .buildFlags();

// `.field("concurrency", "duration")` would not compile: number is not a Duration.

// Names come from the flag annotation, then json, then the property name.
assert.equal(resolveFlag({ name: "pollInterval", kind: "duration", json: "poll_interval" }).name, "poll-interval");

// ============================================================================
// 2. SERIALIZE - One `-name=value` argument per field, in declaration order
// ============================================================================

const args = worker.toArgs(
  {
    queue: "emails",
    concurrency: 8,
    pollInterval: Duration.seconds(90),
    dryRun: false,
    apiToken: "test-secret",
  },
  { prefix: "worker" },
);

assert.deepEqual(args, [
  '-worker-queue="emails"',
  "-worker-concurrency=8",
  "-worker-poll-interval=1m30s",
  "-worker-dry-run=false",
]);

// Exclusions match the final, prefixed name; a dotted set can be narrowed.
const excluded = new ExclusionSet("worker.worker-dry-run", "other.queue");
assert.deepEqual(
  worker.toArgs(
    { queue: "q", concurrency: 1, pollInterval: Duration.second, dryRun: true, apiToken: "" },
    { prefix: "worker", exclude: excluded.subset("worker") },
  ),
  ['-worker-queue="q"', "-worker-concurrency=1", "-worker-poll-interval=1s"],
);

// ============================================================================
// 3. BIND - Register fields with a flag set, defaults applied immediately
// ============================================================================

const flagSet = new FlagSet("worker");
const target: Worker = {
  queue: "",
  concurrency: 0,
  pollInterval: Duration.zero,
  dryRun: false,
  apiToken: "",
};

worker.bind(target, { flagSet, prefix: "worker" });
assert.equal(target.concurrency, 4);
assert.equal(target.pollInterval.toString(), "30s");

flagSet.parse(args);
// String values travel quoted; the flag set stores them as given.
assert.equal(target.queue, '"emails"');
assert.equal(unquote(target.queue), "emails");
assert.equal(target.concurrency, 8);
assert.ok(target.pollInterval.equals(Duration.seconds(90)));
assert.equal(target.apiToken, "");

console.log(flagSet.defaultsText());

// ============================================================================
// 4. STRICT DEFAULTS - Malformed defaults fail instead of falling back to zero
// ============================================================================

interface Limits {
  retries: number;
}

const limits = record<Limits>("Limits").field("retries", "uint", { flag: "retries,,three" }).build();
const lenient: Limits = { retries: 7 };
bindFlags(limits, lenient, { flagSet: new FlagSet("lenient") });
assert.equal(lenient.retries, 0);

assert.throws(
  () => bindFlags(limits, { retries: 0 }, { flagSet: new FlagSet("strict"), strict: true }),
  InvalidDefaultError,
);

// ============================================================================
// 5. INFER - Derive a schema from a sample value
// ============================================================================

const inferred = inferRecord({ host: "localhost", port: 5432, timeout: Duration.seconds(5) }, { name: "Db" });
assert.deepEqual(
  toArgs(inferred, { host: "db.internal", port: 6432, timeout: Duration.minute }, { prefix: "db" }),
  ['-db-host="db.internal"', "-db-port=6432", "-db-timeout=1m0s"],
);
