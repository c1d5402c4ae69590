export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
  uptimeSeconds: number;
  quoteCurrency: string;
}

export interface ServiceIndex {
  service: string;
  supportedChains: readonly string[];
  endpoints: Record<string, string>;
}
