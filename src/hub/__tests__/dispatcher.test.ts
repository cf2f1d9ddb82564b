import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockWarn } = vi.hoisted(() => ({
  mockWarn: vi.fn(),
}));

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: mockWarn,
    error: vi.fn(),
  }),
}));

import { Dispatcher, formatOutcome } from "../dispatcher.js";
import { InstanceRegistry } from "../registry.js";
import type { Message } from "../message.js";
import {
  BackendError,
  HTTPError,
  HubErrorCode,
  InstanceNotFoundError,
} from "../errors.js";
import { EchoBackend } from "../../backends/echo.js";

class Deferred<T> {
  resolve: (value: T) => void = () => {};
  reject: (reason: unknown) => void = () => {};
  promise = new Promise<T>((resolve, reject) => {
    this.resolve = resolve;
    this.reject = reject;
  });
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

type GenerateFn = (messages: readonly Message[]) => Promise<string>;

describe("Dispatcher", () => {
  let registry: InstanceRegistry;
  let dispatcher: Dispatcher;

  /** Registers a one-off backend type and an instance of it. */
  const addInstance = (id: string, impl: GenerateFn) => {
    const generate = vi.fn(impl);
    registry.registerBackendType(`type-${id}`, () => ({ generate }));
    const instance = registry.instantiate(id, `type-${id}`);
    return { instance, generate };
  };

  type AddedInstance = ReturnType<typeof addInstance>;

  /** Records one saved round with a canned reply, then forgets the call. */
  const seedRound = async (
    { instance, generate }: AddedInstance,
    prompt: string,
    reply: string,
    role = "user",
  ) => {
    generate.mockResolvedValueOnce(reply);
    await dispatcher.dispatchOne(instance.id, prompt, {
      role,
      saveContext: true,
      appendPromptBeforeCall: true,
    });
    generate.mockClear();
  };

  beforeEach(() => {
    mockWarn.mockClear();
    registry = new InstanceRegistry();
    dispatcher = new Dispatcher(registry);
  });

  describe("dispatchOne", () => {
    it("should run the echo round-trip and record prompt then reply", async () => {
      registry.registerBackendType("Echo", (config) => new EchoBackend(config));
      registry.instantiate("a", "Echo");

      const response = await dispatcher.dispatchOne("a", "hi", {
        saveContext: true,
        appendPromptBeforeCall: true,
      });

      expect(response).toBe("ECHO:hi");
      expect(registry.getContext("a")).toEqual([
        { role: "user", content: "hi" },
        { role: "assistant", content: "ECHO:hi" },
      ]);
    });

    it("should not send the prompt when appendPromptBeforeCall is off", async () => {
      const added = addInstance("a", async () => "reply");
      const { generate } = added;
      await seedRound(added, "A", "B");

      await dispatcher.dispatchOne("a", "new", { saveContext: false });
      await dispatcher.dispatchOne("a", "new", { saveContext: true });

      expect(generate).toHaveBeenCalledTimes(2);
      expect(generate.mock.calls[0]?.[0]).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
      ]);
      expect(generate.mock.calls[1]?.[0]).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
      ]);
    });

    it("should send a working copy and leave the history untouched", async () => {
      const added = addInstance("a", async () => "reply");
      await seedRound(added, "A", "B");

      await dispatcher.dispatchOne("a", "p", { appendPromptBeforeCall: true });

      expect(added.generate.mock.calls[0]?.[0]).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
        { role: "user", content: "p" },
      ]);
      expect(registry.getContext("a")).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
      ]);
    });

    it("should append prompt and reply, in order, when both flags are set", async () => {
      const added = addInstance("a", async () => "reply");
      const { instance } = added;
      await seedRound(added, "be brief", "ok", "system");

      await dispatcher.dispatchOne("a", "question", {
        role: "user",
        saveContext: true,
        appendPromptBeforeCall: true,
      });

      expect(instance.context).toEqual([
        { role: "system", content: "be brief" },
        { role: "assistant", content: "ok" },
        { role: "user", content: "question" },
        { role: "assistant", content: "reply" },
      ]);
    });

    it("should only record the reply when the prompt was not sent", async () => {
      const { instance } = addInstance("a", async () => "reply");

      await dispatcher.dispatchOne("a", "question", { saveContext: true });

      expect(instance.context).toEqual([{ role: "assistant", content: "reply" }]);
    });

    it("should leave the live context unchanged without saveContext", async () => {
      const added = addInstance("a", async () => "reply");
      await seedRound(added, "A", "B");

      await dispatcher.dispatchOne("a", "x", { appendPromptBeforeCall: true });
      await dispatcher.dispatchOne("a", "y", { appendPromptBeforeCall: false });

      expect(added.instance.context).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
      ]);
    });

    it("should use the given role for the prompt message", async () => {
      const { instance, generate } = addInstance("a", async () => "ack");

      await dispatcher.dispatchOne("a", "rules", {
        role: "system",
        saveContext: true,
        appendPromptBeforeCall: true,
      });

      expect(generate.mock.calls[0]?.[0]).toEqual([{ role: "system", content: "rules" }]);
      expect(instance.context[0]).toEqual({ role: "system", content: "rules" });
    });

    it("should store frozen messages", async () => {
      const { instance } = addInstance("a", async () => "reply");
      await dispatcher.dispatchOne("a", "q", { saveContext: true, appendPromptBeforeCall: true });
      expect(instance.context.every((m) => Object.isFrozen(m))).toBe(true);
    });

    it("should reject with InstanceNotFoundError for an unknown id", async () => {
      await expect(dispatcher.dispatchOne("ghost", "hi")).rejects.toBeInstanceOf(
        InstanceNotFoundError,
      );
    });

    it("should wrap backend failures in BackendError and keep the context", async () => {
      const cause = new Error("socket hang up");
      const added = addInstance("a", async () => {
        throw cause;
      });
      await seedRound(added, "A", "B");

      const error = await dispatcher
        .dispatchOne("a", "hi", { saveContext: true, appendPromptBeforeCall: true })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({
        message: "socket hang up",
        instanceId: "a",
        code: HubErrorCode.BACKEND_FAILED,
        cause,
      });
      expect(added.instance.context).toEqual([
        { role: "user", content: "A" },
        { role: "assistant", content: "B" },
      ]);
    });

    it("should pass BackendError subclasses through unchanged", async () => {
      const httpError = new HTTPError(503, "HTTP 503: overloaded");
      addInstance("a", async () => {
        throw httpError;
      });

      await expect(dispatcher.dispatchOne("a", "hi")).rejects.toBe(httpError);
      expect(httpError.instanceId).toBe("a");
    });

    it("should not re-tag an error already attributed to another instance", async () => {
      const shared = new HTTPError(429, "HTTP 429: rate limited");
      const failing = async () => {
        throw shared;
      };
      addInstance("a", failing);
      addInstance("b", failing);

      await expect(dispatcher.dispatchOne("a", "hi")).rejects.toBe(shared);
      const error = await dispatcher.dispatchOne("b", "hi").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).not.toBe(shared);
      expect(error).toMatchObject({
        message: "HTTP 429: rate limited",
        instanceId: "b",
        cause: shared,
      });
      expect(shared.instanceId).toBe("a");
    });

    it("should finish a round whose instance was removed without touching its successor", async () => {
      const gate = new Deferred<string>();
      addInstance("a", () => gate.promise);

      const pending = dispatcher.dispatchOne("a", "hi", {
        saveContext: true,
        appendPromptBeforeCall: true,
      });
      await flush();

      expect(registry.remove("a")).toBe(true);
      const successor = registry.instantiate("a", "type-a");

      gate.resolve("late reply");

      await expect(pending).resolves.toBe("late reply");
      expect(registry.resolve("a")).toBe(successor);
      expect(registry.getContext("a")).toEqual([]);
      expect(successor.context).toEqual([]);
    });

    it("should keep each round contiguous when rounds overlap on one instance", async () => {
      const slow = new Deferred<string>();
      const replies = [slow.promise, Promise.resolve("fast")];
      const { instance, generate } = addInstance("a", async () => {
        const next = replies.shift();
        if (!next) throw new Error("unexpected call");
        return next;
      });
      const opts = { saveContext: true, appendPromptBeforeCall: true };

      const first = dispatcher.dispatchOne("a", "p1", opts);
      const second = dispatcher.dispatchOne("a", "p2", opts);
      await second;
      slow.resolve("slow");
      await first;

      // Both requests were built from the empty history
      expect(generate.mock.calls[0]?.[0]).toEqual([{ role: "user", content: "p1" }]);
      expect(generate.mock.calls[1]?.[0]).toEqual([{ role: "user", content: "p2" }]);
      // Appends land in completion order
      expect(instance.context).toEqual([
        { role: "user", content: "p2" },
        { role: "assistant", content: "fast" },
        { role: "user", content: "p1" },
        { role: "assistant", content: "slow" },
      ]);
    });
  });

  describe("dispatchMany", () => {
    it("should report each target independently when one backend fails", async () => {
      const a = addInstance("a", async () => "from a");
      const b = addInstance("b", async () => {
        throw new Error("boom");
      });
      const c = addInstance("c", async () => "from c");
      const opts = { saveContext: true, appendPromptBeforeCall: true };

      const results = await dispatcher.dispatchMany(["a", "b", "c"], "hello", opts);

      expect(results.size).toBe(3);
      expect(results.get("a")).toEqual({ id: "a", ok: true, response: "from a" });
      expect(results.get("b")).toEqual({
        id: "b",
        ok: false,
        error: "boom",
        code: HubErrorCode.BACKEND_FAILED,
      });
      expect(results.get("c")).toEqual({ id: "c", ok: true, response: "from c" });

      expect(a.instance.context).toEqual([
        { role: "user", content: "hello" },
        { role: "assistant", content: "from a" },
      ]);
      expect(b.instance.context).toEqual([]);
      expect(c.instance.context).toEqual([
        { role: "user", content: "hello" },
        { role: "assistant", content: "from c" },
      ]);
      expect(mockWarn).toHaveBeenCalledWith("Instance 'b' failed: boom");
    });

    it("should report an unknown id as a failure without affecting the others", async () => {
      addInstance("a", async () => "ok");

      const results = await dispatcher.dispatchMany(["a", "ghost"], "hi");

      expect(results.get("a")).toEqual({ id: "a", ok: true, response: "ok" });
      expect(results.get("ghost")).toEqual({
        id: "ghost",
        ok: false,
        error: "Instance 'ghost' not found",
        code: HubErrorCode.INSTANCE_NOT_FOUND,
      });
    });

    it("should start every backend call before any of them settles", async () => {
      const gates = [new Deferred<string>(), new Deferred<string>(), new Deferred<string>()];
      const calls = ["a", "b", "c"].map((id, i) =>
        addInstance(id, () => gates[i]?.promise ?? Promise.reject(new Error("no gate"))),
      );

      const pending = dispatcher.dispatchMany(["a", "b", "c"], "go");
      await flush();

      for (const { generate } of calls) {
        expect(generate).toHaveBeenCalledTimes(1);
      }

      gates.forEach((gate, i) => gate.resolve(`r${i}`));
      const results = await pending;
      expect([...results.values()].map(formatOutcome)).toEqual(["r0", "r1", "r2"]);
    });

    it("should not resolve until the slowest target has settled", async () => {
      const slow = new Deferred<string>();
      addInstance("fast", async () => "quick");
      addInstance("slow", () => slow.promise);

      let done = false;
      const pending = dispatcher.dispatchMany(["fast", "slow"], "go").then((r) => {
        done = true;
        return r;
      });

      await flush();
      await flush();
      expect(done).toBe(false);

      slow.reject(new Error("late failure"));
      const results = await pending;

      expect(done).toBe(true);
      expect(results.get("fast")).toEqual({ id: "fast", ok: true, response: "quick" });
      expect(results.get("slow")).toMatchObject({ ok: false, error: "late failure" });
    });

    it("should wait for backends with very different latencies", async () => {
      registry.registerBackendType("Echo", (config) => new EchoBackend(config));
      registry.instantiate("quick", "Echo", { delayMs: 1, prefix: "Q:" });
      registry.instantiate("lazy", "Echo", { delayMs: 100, prefix: "L:" });

      const results = await dispatcher.dispatchMany(["quick", "lazy"], "ping", {
        appendPromptBeforeCall: true,
      });

      expect(results.get("quick")).toEqual({ id: "quick", ok: true, response: "Q:ping" });
      expect(results.get("lazy")).toEqual({ id: "lazy", ok: true, response: "L:ping" });
    });

    it("should dispatch duplicate ids once per occurrence", async () => {
      let n = 0;
      const { instance, generate } = addInstance("a", async () => `reply ${++n}`);

      const results = await dispatcher.dispatchMany(["a", "a"], "hi", {
        saveContext: true,
        appendPromptBeforeCall: true,
      });

      expect(generate).toHaveBeenCalledTimes(2);
      expect(results.size).toBe(1);
      expect(results.get("a")).toEqual({ id: "a", ok: true, response: "reply 2" });
      expect(instance.context).toHaveLength(4);
    });

    it("should return an empty map for no ids", async () => {
      const results = await dispatcher.dispatchMany([], "hi");
      expect(results.size).toBe(0);
    });
  });

  describe("formatOutcome", () => {
    it("should render replies as-is and failures with an ERROR prefix", () => {
      expect(formatOutcome({ id: "a", ok: true, response: "hello" })).toBe("hello");
      expect(
        formatOutcome({ id: "a", ok: false, error: "boom", code: HubErrorCode.BACKEND_FAILED }),
      ).toBe("ERROR: boom");
    });
  });
});
