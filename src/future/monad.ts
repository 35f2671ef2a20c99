import { Monad } from "../algebra";
import { Future } from "./future";
import { resolved } from "./construct";
import { all, spreadThen } from "./combinators";
import { isFutureValue } from "./inspect";

/**
 * Functor, Applicative and Monad instance for futures, built only on chaining and the combinators
 */
export const futureMonad: Monad<"Future"> = {
  uri: "Future",

  fmap<A, B>(f: (value: A) => B, mv: Future<A>): Future<B> {
    return mv.then<B>(f);
  },

  pure<A>(value: A): Future<A> {
    return resolved(value);
  },

  fapply<A, B>(mf: Future<(value: A) => B>, mv: Future<A>): Future<B> {
    const both = all([mf, mv]);
    return spreadThen<[(value: A) => B, A], B>(both, (f, value) => f(value));
  },

  mreturn<A>(value: A): Future<A> {
    return resolved(value);
  },

  mbind<A, B>(mv: Future<A>, f: (value: A, context: Monad<"Future">) => Future<B>): Future<B> {
    return mv.then<B>((value) => f(value, futureMonad));
  },
};

/**
 * Returns the monad instance a value belongs to, if it is a future value
 * @param value
 */
export const contextOf = (value: unknown): Monad<"Future"> | undefined =>
  isFutureValue(value) ? futureMonad : undefined;
