export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface TlsConfig {
  certFile: string;
  keyFile: string;
  trustAnchorFile: string;
  verifyHostname: boolean;
}

export interface FilewireConfig {
  chunkSize: number;
  receiveDir: string;
  metricsFile: string;
  logLevel: LogLevel;
  logDir?: string;
  tls: TlsConfig;
}

export type FilewireConfigOverrides = Partial<Omit<FilewireConfig, 'tls'>> & {
  tls?: Partial<TlsConfig>;
};

export interface SecureClientOptions {
  trustAnchor: string | Buffer;
  /**
   * Defaults to false: any certificate chaining to the trust anchor is
   * accepted regardless of the host it was issued for. Only suitable for
   * self-signed deployments reached by IP address.
   */
  verifyHostname?: boolean;
}

export interface SecureServerOptions {
  cert: string | Buffer;
  key: string | Buffer;
}
