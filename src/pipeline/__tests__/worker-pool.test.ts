import assert from "node:assert/strict";
import test from "node:test";
import { QueueFullError } from "../../lib/errors.js";
import { WorkerPool } from "../worker-pool.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

test("submit runs up to concurrency jobs and queues the rest", async () => {
  const pool = new WorkerPool({ concurrency: 2, queueLimit: 1 });
  const gates = [deferred(), deferred(), deferred()];
  const started: string[] = [];

  gates.forEach((gate, index) => {
    pool.submit({
      id: `job-${String(index)}`,
      run: async () => {
        started.push(`job-${String(index)}`);
        await gate.promise;
      }
    });
  });

  assert.deepEqual(pool.stats(), { active: 2, queued: 1, concurrency: 2, queueLimit: 1 });
  assert.deepEqual(started, ["job-0", "job-1"]);
  assert.equal(pool.canAccept(), false);
  assert.throws(() => pool.submit({ id: "job-3", run: async () => undefined }), QueueFullError);

  gates[0]?.resolve();
  await tick();
  assert.deepEqual(started, ["job-0", "job-1", "job-2"]);
  assert.deepEqual(pool.stats(), { active: 2, queued: 0, concurrency: 2, queueLimit: 1 });

  gates[1]?.resolve();
  gates[2]?.resolve();
  await pool.onIdle();
  assert.deepEqual(pool.stats(), { active: 0, queued: 0, concurrency: 2, queueLimit: 1 });
});

test("a failing job does not stop the pool", async () => {
  const pool = new WorkerPool({ concurrency: 1, queueLimit: 4 });
  const completed: string[] = [];

  pool.submit({
    id: "broken",
    run: async () => {
      throw new Error("tool crashed");
    }
  });
  pool.submit({
    id: "healthy",
    run: async () => {
      completed.push("healthy");
    }
  });

  await pool.onIdle();
  assert.deepEqual(completed, ["healthy"]);
});

test("close aborts running jobs, drops queued ones and refuses new work", async () => {
  const pool = new WorkerPool({ concurrency: 1, queueLimit: 4 });
  let abortedRunning = false;
  let queuedRan = false;

  pool.submit({
    id: "running",
    run: (signal) =>
      new Promise<void>((resolve) => {
        signal.addEventListener(
          "abort",
          () => {
            abortedRunning = true;
            resolve();
          },
          { once: true }
        );
      })
  });
  pool.submit({
    id: "queued",
    run: async () => {
      queuedRan = true;
    }
  });

  await pool.close();

  assert.equal(abortedRunning, true);
  assert.equal(queuedRan, false);
  assert.equal(pool.canAccept(), false);
  assert.throws(() => pool.submit({ id: "late", run: async () => undefined }), QueueFullError);
});

test("onIdle resolves immediately for an idle pool", async () => {
  await new WorkerPool({ concurrency: 1, queueLimit: 0 }).onIdle();
});
