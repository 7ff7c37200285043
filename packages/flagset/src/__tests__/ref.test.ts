import { describe, expect, it } from "vitest";
import { Duration } from "../duration.js";
import { fieldRef, propertyRef, ref } from "../ref.js";

describe("references", () => {
  it("boxes a standalone value", () => {
    const count = ref(1);
    count.set(2);
    expect(count.get()).toBe(2);
  });

  it("writes through to a typed property", () => {
    const options = { port: 80, host: "a" };
    const port = propertyRef(options, "port");
    port.set(443);
    expect(options.port).toBe(443);
    expect(port.get()).toBe(443);
  });

  it("falls back when a loose record holds the wrong type", () => {
    const record: Record<string, unknown> = { timeout: "soon" };
    const timeout = fieldRef(record, "timeout", Duration.isDuration, Duration.zero);
    expect(timeout.get()).toBe(Duration.zero);

    timeout.set(Duration.seconds(3));
    expect(record.timeout).toBeInstanceOf(Duration);
    expect(timeout.get().toString()).toBe("3s");
  });
});
