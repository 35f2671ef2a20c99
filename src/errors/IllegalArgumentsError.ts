/**
 * Thrown to indicate that a method/function has been passed an illegal or inappropriate argument
 */
export class IllegalArgumentsError extends Error {
  readonly arguments: unknown[];

  constructor(args: unknown[], message?: string) {
    super(message ?? `Received invalid arguments of type ${args.map((arg) => typeof arg).join(",")}`);
    this.arguments = args;
  }
}
