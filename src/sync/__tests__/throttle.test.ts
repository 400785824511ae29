import { describe, it, expect } from "vitest";
import { RequestThrottle, type Clock } from "@/sync/discogs/throttle";

class FakeClock implements Clock {
  t = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

describe("RequestThrottle", () => {
  it("lets the first request through and spaces the following ones", async () => {
    const clock = new FakeClock();
    const throttle = new RequestThrottle(1000, clock);

    await throttle.wait();
    await throttle.wait();
    clock.t += 400;
    await throttle.wait();
    clock.t += 1500;
    await throttle.wait();

    expect(clock.sleeps).toEqual([1000, 600]);
  });

  it("keeps state per instance", async () => {
    const clock = new FakeClock();
    const a = new RequestThrottle(1000, clock);
    const b = new RequestThrottle(1000, clock);

    await a.wait();
    await b.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it("never sleeps with a zero interval", async () => {
    const clock = new FakeClock();
    const throttle = new RequestThrottle(0, clock);

    await throttle.wait();
    await throttle.wait();

    expect(clock.sleeps).toEqual([]);
  });
});
