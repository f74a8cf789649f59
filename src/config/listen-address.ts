export type ListenAddress = {
  /** Interface to bind; undefined binds every interface. */
  host?: string;
  port: number;
};

const ADDRESS_PATTERN = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/;

const MAX_PORT = 65_535;

/**
 * Parses `host:port`, `[ipv6]:port` or `:port`. Returns undefined for anything else.
 */
export const parseListenAddress = (value: string): ListenAddress | undefined => {
  const match = ADDRESS_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, bracketedHost, plainHost, rawPort] = match;
  const port = Number(rawPort);
  if (port > MAX_PORT) return undefined;

  const host = bracketedHost ?? plainHost;
  return host ? { host, port } : { port };
};

export const formatListenAddress = ({ host, port }: ListenAddress): string => {
  if (!host) return `:${port}`;
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
};
