import {
  all,
  allSettled,
  configure,
  delay,
  EngineCell,
  FailureKind,
  FutureCancelled,
  FutureEngine,
  nativeEngine,
  OperationalError,
  quorum,
  rejected,
  resetSettings,
  resolved,
  spreadThen,
  timeout,
  TimeoutError,
  withSignal,
} from "../../../src";

type Listener<T> = { onFulfilled: (value: T) => void; onRejected: (reason: unknown) => void };

/**
 * Engine whose callbacks only run when the test flushes its queue
 */
class ManualEngine implements FutureEngine {
  readonly name = "manual";
  readonly queue: Array<() => void> = [];

  cell<T>(): EngineCell<T> {
    return new ManualCell<T>(this.queue);
  }

  classify(reason: unknown): FailureKind {
    return reason === "too slow" ? "timeout" : "generic";
  }

  flush() {
    let job = this.queue.shift();
    while (job) {
      job();
      job = this.queue.shift();
    }
  }
}

class ManualCell<T> implements EngineCell<T> {
  private settlement?: { fulfilled: true; value: T } | { fulfilled: false; reason: unknown };
  private readonly listeners: Array<Listener<T>> = [];

  constructor(private readonly queue: Array<() => void>) {}

  resolve(value: T) {
    this.finish({ fulfilled: true, value });
  }

  reject(reason: unknown) {
    this.finish({ fulfilled: false, reason });
  }

  subscribe(onFulfilled: (value: T) => void, onRejected: (reason: unknown) => void) {
    this.listeners.push({ onFulfilled, onRejected });
    this.drain();
  }

  private finish(settlement: { fulfilled: true; value: T } | { fulfilled: false; reason: unknown }) {
    if (this.settlement) return;
    this.settlement = settlement;
    this.drain();
  }

  private drain() {
    const settlement = this.settlement;
    if (!settlement) return;
    this.listeners.splice(0).forEach(({ onFulfilled, onRejected }) =>
      this.queue.push(() => (settlement.fulfilled ? onFulfilled(settlement.value) : onRejected(settlement.reason)))
    );
  }
}

describe("Engine binding", () => {
  afterEach(() => resetSettings());

  it("should deliver callbacks only when the engine runs them", () => {
    const engine = new ManualEngine();
    const seen: number[] = [];
    const future = resolved(2, engine).then((value) => {
      seen.push(value);
      return value * 3;
    });

    expect(future.engine).toBe(engine);
    expect(seen).toEqual([]);
    expect(future.isPending()).toBeTruthy();

    engine.flush();
    expect(seen).toEqual([2]);
    expect(future.getValue()).toEqual(6);
  });

  it("should classify failures with the engine of the future", () => {
    const engine = new ManualEngine();
    const handled = rejected("too slow", engine).catchByKind("timeout", () => "recovered");

    engine.flush();
    expect(handled.getValue()).toEqual("recovered");
  });

  it("should create futures on the configured engine", () => {
    const engine = new ManualEngine();
    configure({ engine });

    expect(resolved(1).engine).toBe(engine);

    resetSettings();
    expect(resolved(1).engine).toBe(nativeEngine);
  });

  it("should build combinator results on the engine of their inputs", () => {
    const engine = new ManualEngine();
    const combined = all([resolved(1, engine), resolved(2, engine)]);
    const outcomes = allSettled([resolved(1, engine), rejected("boom", engine)]);
    const first = quorum(1, [resolved(1, engine)]);
    const sum = spreadThen(resolved<[number, number]>([1, 2], engine), (a, b) => a + b);
    const limited = timeout(resolved(1, engine), 1000);
    const guarded = withSignal(resolved("kept", engine), new AbortController().signal);

    [combined, outcomes, first, sum, limited, guarded].forEach((future) => expect(future.engine).toBe(engine));

    engine.flush();
    expect(combined.getValue()).toEqual([1, 2]);
    expect(outcomes.getValue()).toEqual([
      { status: "fulfilled", value: 1 },
      { status: "rejected", reason: "boom" },
    ]);
    expect(first.getValue()).toEqual([1]);
    expect(sum.getValue()).toEqual(3);
    expect(limited.getValue()).toEqual(1);
    expect(guarded.getValue()).toEqual("kept");
  });

  it("should classify failures of combinator results with the engine of their inputs", () => {
    const engine = new ManualEngine();
    const handled = timeout(rejected("too slow", engine), 1000).catchByKind("timeout", () => "recovered");

    engine.flush();
    expect(handled.getValue()).toEqual("recovered");
  });

  it("should create delays on the given engine", () => {
    const engine = new ManualEngine();
    const controller = new AbortController();
    const future = delay(1000, "value", controller.signal, engine);

    expect(future.engine).toBe(engine);
    controller.abort();
    expect(future.getReason()).toBeInstanceOf(FutureCancelled);
  });

  describe("nativeEngine", () => {
    it("should classify library failures", () => {
      expect(nativeEngine.classify(new TimeoutError(5))).toEqual("timeout");
      expect(nativeEngine.classify(new FutureCancelled())).toEqual("cancellation");
      expect(nativeEngine.classify(new OperationalError("failed"))).toEqual("operational");
      expect(nativeEngine.classify(new Error("failed"))).toEqual("generic");
      expect(nativeEngine.classify("failed")).toEqual("generic");
    });

    it("should classify platform failures by name", () => {
      const platformTimeout = new Error("signal timed out");
      platformTimeout.name = "TimeoutError";

      expect(nativeEngine.classify(platformTimeout)).toEqual("timeout");
      expect(nativeEngine.classify(AbortSignal.abort().reason)).toEqual("cancellation");
    });

    it("should classify named failures that are not Error instances", () => {
      expect(nativeEngine.classify({ name: "AbortError", message: "aborted" })).toEqual("cancellation");
      expect(nativeEngine.classify({ name: "TimeoutError", message: "signal timed out" })).toEqual("timeout");
      expect(nativeEngine.classify({ message: "no name" })).toEqual("generic");
    });

    it("should run subscribers after settlement, in order", async () => {
      const cell = nativeEngine.cell<string>();
      const order: string[] = [];
      cell.subscribe((value) => order.push(`first ${value}`), () => {});
      cell.subscribe((value) => order.push(`second ${value}`), () => {});

      cell.resolve("done");
      cell.reject(new Error("ignored"));
      expect(order).toEqual([]);

      await resolved(undefined);
      expect(order).toEqual(["first done", "second done"]);
    });
  });
});
