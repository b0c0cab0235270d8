const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

type ResultBase<T, E> = {
  isOk: () => this is OkResult<T>;
  isErr: () => this is ErrResult<T, E>;
  unwrapOr: (fallback: T) => T;
};

export type OkResult<T> = ResultBase<T, never> & {
  readonly _tag: "ok";
  readonly value: T;
  readonly error?: undefined;
};

export type ErrResult<T, E> = ResultBase<T, E> & {
  readonly _tag: "err";
  readonly value?: undefined;
  readonly error: E;
};

export type Result<T, E> = OkResult<T> | ErrResult<T, E>;

export type ResultAsync<T, E> = Promise<Result<T, E>>;

const makeOk = <T>(value: T): OkResult<T> => ({
  _tag: "ok",
  value,
  isOk(): this is OkResult<T> {
    return true;
  },
  isErr(): this is ErrResult<T, never> {
    return false;
  },
  unwrapOr: () => value,
});

const makeErr = <T, E>(error: E): ErrResult<T, E> => ({
  _tag: "err",
  error,
  isOk(): this is OkResult<T> {
    return false;
  },
  isErr(): this is ErrResult<T, E> {
    return true;
  },
  unwrapOr: (fallback: T) => fallback,
});

export const ok = <T, E = never>(value: T): Result<T, E> => makeOk<T>(value);

export const err = <T = never, E = Error>(error: E): Result<T, E> =>
  makeErr<T, E>(error);

export function safeSync<T>(fn: () => T): Result<T, Error>;
export function safeSync<T, E>(
  fn: () => T,
  onError: (error: unknown) => E
): Result<T, E>;
export function safeSync<T, E>(
  fn: () => T,
  onError?: (error: unknown) => E
): Result<T, E | Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(onError ? onError(error) : toError(error));
  }
}

export function safeAsync<T>(fn: () => Promise<T> | T): ResultAsync<T, Error>;
export function safeAsync<T, E>(
  fn: () => Promise<T> | T,
  onError: (error: unknown) => E
): ResultAsync<T, E>;
export async function safeAsync<T, E>(
  fn: () => Promise<T> | T,
  onError?: (error: unknown) => E
): ResultAsync<T, E | Error> {
  try {
    return ok<T, E | Error>(await fn());
  } catch (error) {
    return err(onError ? onError(error) : toError(error));
  }
}
