import { composeK, delay, Future, futureMonad, join, liftA2, rejected, resolved, sequence, traverse } from "../../../src";

describe("Generic algorithms", () => {
  it("should sequence futures in order", async () => {
    const values = sequence<"Future", number>(futureMonad, [delay(15, 1), delay(5, 2), resolved(3)]);

    expect(await values).toEqual([1, 2, 3]);
  });

  it("should sequence an empty list", async () => {
    expect(await sequence<"Future", number>(futureMonad, [])).toEqual([]);
  });

  it("should fail to sequence when a future fails", async () => {
    await expect(sequence<"Future", number>(futureMonad, [resolved(1), rejected("boom")])).rejects.toEqual("boom");
  });

  it("should traverse values", async () => {
    const values = traverse(futureMonad, (value: number) => delay(5 * (3 - value), value * 10), [1, 2, 3]);

    expect(await values).toEqual([10, 20, 30]);
  });

  it("should lift binary functions", async () => {
    const label = liftA2(futureMonad, (count: number, name: string) => `${name}:${count}`);

    expect(await label(delay(5, 2), resolved("items"))).toEqual("items:2");
  });

  it("should flatten nested futures", async () => {
    const nested = new Future<Future<string>>((resolve) => resolve(resolved(delay(5, "inner"))));
    const flat = join<"Future", string>(futureMonad, nested);

    expect(await flat).toEqual("inner");
  });

  it("should compose functions returning futures", async () => {
    const incrementThenDouble = composeK(
      futureMonad,
      (value: number) => resolved(value + 1),
      (value: number) => delay(1, value * 2)
    );

    expect(await incrementThenDouble(3)).toEqual(8);
  });
});
