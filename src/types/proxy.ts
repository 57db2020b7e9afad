/**
 * Proxy URIs per target scheme. An empty string means a direct connection.
 */
export interface ProxyRoutes {
  http: string;
  https: string;
}

export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}
