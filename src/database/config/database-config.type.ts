export type DatabaseConfig = {
  url?: string;
  type: string;
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize: boolean;
  maxConnections: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
  ca?: string;
  // false = no logging, true = everything, array = selected log levels
  logging: boolean | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
