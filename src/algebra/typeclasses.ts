import { Kind, URIS } from "./hkt";

export interface Functor<F extends URIS> {
  readonly uri: F;

  fmap<A, B>(f: (value: A) => B, mv: Kind<F, A>): Kind<F, B>;
}

export interface Applicative<F extends URIS> extends Functor<F> {
  pure<A>(value: A): Kind<F, A>;

  /**
   * Applies the function held by `mf` to the value held by `mv`
   */
  fapply<A, B>(mf: Kind<F, (value: A) => B>, mv: Kind<F, A>): Kind<F, B>;
}

/**
 * Sequential composition. The continuation given to mbind receives the instance it runs under as its second
 * argument, so generic code inside it resolves pure/mbind against the same instance
 */
export interface Monad<F extends URIS> extends Applicative<F> {
  mreturn<A>(value: A): Kind<F, A>;

  mbind<A, B>(mv: Kind<F, A>, f: (value: A, context: Monad<F>) => Kind<F, B>): Kind<F, B>;
}
