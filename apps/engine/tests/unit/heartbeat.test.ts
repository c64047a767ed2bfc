import { HeartbeatService } from "../../src/services/heartbeat.service";
import { sleep } from "../helpers/poll";

describe("HeartbeatService", () => {
  let beats: string[];
  let heartbeat: HeartbeatService;

  const beatFor = (key: string) => async () => {
    beats.push(key);
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    beats = [];
    heartbeat = new HeartbeatService(50); // 50ms interval
  });

  afterEach(() => {
    heartbeat.stopAll();
    jest.restoreAllMocks();
  });

  it("beats immediately and then on the interval", async () => {
    heartbeat.start("job-1", beatFor("job-1"));
    expect(beats).toEqual(["job-1"]);

    await sleep(130); // allow ~2 ticks
    expect(beats.length).toBeGreaterThanOrEqual(2);
    expect(heartbeat.isRunning("job-1")).toBe(true);

    heartbeat.stop("job-1");
    expect(heartbeat.isRunning("job-1")).toBe(false);
  });

  it("supports multiple concurrent keys", async () => {
    heartbeat.start("job-1", beatFor("job-1"));
    heartbeat.start("job-2", beatFor("job-2"));
    expect(heartbeat.activeCount).toBe(2);

    heartbeat.stop("job-1");
    beats = [];
    await sleep(120);

    expect(beats).not.toContain("job-1");
    expect(beats).toContain("job-2");
  });

  it("restarts a key that is already beating", () => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    heartbeat.start("job-1", beatFor("first"));
    heartbeat.start("job-1", beatFor("second"));

    expect(heartbeat.activeCount).toBe(1);
    expect(beats).toEqual(["first", "second"]);
  });

  it("keeps beating after a failed beat", async () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    let calls = 0;
    heartbeat.start("job-1", async () => {
      calls++;
      throw new Error("db down");
    });

    await sleep(130);
    expect(calls).toBeGreaterThanOrEqual(2);
    expect(error).toHaveBeenCalledWith("[heartbeat] failed to update for job-1:", expect.any(Error));
  });

  it("stopAll stops everything", async () => {
    heartbeat.start("t1", beatFor("t1"));
    heartbeat.start("t2", beatFor("t2"));
    heartbeat.stopAll();

    beats = [];
    await sleep(100);
    expect(beats).toEqual([]);
    expect(heartbeat.activeCount).toBe(0);
  });
});
