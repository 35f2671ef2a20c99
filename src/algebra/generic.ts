import { Kind, URIS } from "./hkt";
import { Applicative, Monad } from "./typeclasses";

/**
 * Lifts a binary function to operate on two containers
 * @param context
 * @param f
 */
export const liftA2 =
  <F extends URIS, A, B, C>(context: Applicative<F>, f: (a: A, b: B) => C) =>
  (ma: Kind<F, A>, mb: Kind<F, B>): Kind<F, C> =>
    context.fapply<B, C>(
      context.fmap<A, (b: B) => C>((a) => (b) => f(a, b), ma),
      mb
    );

/**
 * Turns a list of containers into a container of the list of their values, keeping the order
 * @param context
 * @param values
 */
export function sequence<F extends URIS, A>(context: Monad<F>, values: ReadonlyArray<Kind<F, A>>): Kind<F, A[]> {
  return values.reduce<Kind<F, A[]>>(
    (accumulated, mv) =>
      context.mbind<A[], A[]>(accumulated, (items, inner) => inner.fmap<A, A[]>((item) => [...items, item], mv)),
    context.mreturn<A[]>([])
  );
}

/**
 * Maps every value to a container and sequences the results
 * @param context
 * @param f
 * @param values
 */
export const traverse = <F extends URIS, A, B>(context: Monad<F>, f: (value: A) => Kind<F, B>, values: readonly A[]) =>
  sequence(context, values.map(f));

/**
 * Flattens a container of containers by one level
 * @param context
 * @param mmv
 */
export const join = <F extends URIS, A>(context: Monad<F>, mmv: Kind<F, Kind<F, A>>): Kind<F, A> =>
  context.mbind<Kind<F, A>, A>(mmv, (inner) => inner);

/**
 * Left-to-right composition of two functions returning containers
 * @param context
 * @param f
 * @param g
 */
export const composeK =
  <F extends URIS, A, B, C>(context: Monad<F>, f: (value: A) => Kind<F, B>, g: (value: B) => Kind<F, C>) =>
  (value: A): Kind<F, C> =>
    context.mbind<B, C>(f(value), (result) => g(result));
