/**
 * Authenticated caller, as handed over by the identity layer.
 * The core never authenticates; it only authorizes against the
 * membership data it owns.
 */
export interface Principal {
  userId: string;
  username: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    // passport assigns the value returned by JwtStrategy.validate to req.user
    // eslint-disable-next-line @typescript-eslint/no-empty-object-type
    interface User extends Principal {}
  }
}
