/**
 * Web-server side of a domain: whether its site is served, and switching it.
 */
export interface WebServer {
  isEnabled(domain: string): Promise<boolean>;
  enable(domain: string): Promise<void>;
  disable(domain: string): Promise<void>;
}

/** Values substituted into a generated site configuration. */
export interface SiteTemplateOptions {
  liveDir: string;
  webroot: string;
  upstream: string;
}
