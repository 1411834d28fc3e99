export interface Credentials {
  username: string;
  password: string;
}

export interface SuiteConfig {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs: number;
  reportDir: string;
  saveReport: boolean;
}
