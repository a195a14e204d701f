// Command-line helpers shared by the examples.

/** Return whether our process is a client. With no arguments we host. */
export function isClient(argv: string[]): boolean {
  const client = argv.includes("client");
  const server = argv.includes("server");
  if (client && server) {
    throw new Error("This process cannot be both the client and the server.");
  }
  return client;
}

/** Value of the first `--name=value` argument. */
export function flag(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

/** The `--ticket=` argument, which clients must pass. */
export function ticketArg(argv: string[]): string {
  const ticket = flag(argv, "ticket");
  if (!ticket) {
    throw new Error("No ticket provided. Clients must provide a ticket to find a server.");
  }
  return ticket;
}

/** A non-negative integer flag, or `fallback` when it is absent. */
export function countFlag(argv: string[], name: string, fallback: number): number {
  const value = flag(argv, name);
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new Error(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}
