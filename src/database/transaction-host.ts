/**
 * Unit-of-work boundary used by the services.
 *
 * Everything the work callback does through a repository runs in one
 * transaction; the promise settles after commit (or rollback). A nested
 * `run` joins the outer transaction.
 *
 * Abstract class rather than interface so it doubles as the DI token.
 */
export abstract class TransactionHost {
  abstract run<T>(work: () => Promise<T>): Promise<T>;
}
