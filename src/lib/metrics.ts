import type { Ceiling } from '../types';

export interface QuotaMetricsData {
  allowed: number;
  rejected: Record<Ceiling, number>;
  storeErrors: number;
  cancelled: number;
}

const CEILINGS: Ceiling[] = ['requests_per_minute', 'tokens_per_minute', 'requests_per_day'];

export class QuotaMetrics {
  private data: QuotaMetricsData = QuotaMetrics.empty();

  private static empty(): QuotaMetricsData {
    return {
      allowed: 0,
      rejected: { requests_per_minute: 0, tokens_per_minute: 0, requests_per_day: 0 },
      storeErrors: 0,
      cancelled: 0,
    };
  }

  recordAllowed(): void {
    this.data.allowed++;
  }

  recordRejected(ceiling: Ceiling): void {
    this.data.rejected[ceiling]++;
  }

  recordStoreError(): void {
    this.data.storeErrors++;
  }

  recordCancelled(): void {
    this.data.cancelled++;
  }

  getCurrentMetrics(): QuotaMetricsData {
    return { ...this.data, rejected: { ...this.data.rejected } };
  }

  reset(): void {
    this.data = QuotaMetrics.empty();
  }

  getPrometheusMetrics(prefix = 'quota_gate_'): string {
    const current = this.getCurrentMetrics();
    const lines = [
      `# HELP ${prefix}checks_allowed_total Quota checks that were admitted`,
      `# TYPE ${prefix}checks_allowed_total counter`,
      `${prefix}checks_allowed_total ${current.allowed}`,
      '',
      `# HELP ${prefix}checks_rejected_total Quota checks rejected, by ceiling`,
      `# TYPE ${prefix}checks_rejected_total counter`,
      ...CEILINGS.map((ceiling) => `${prefix}checks_rejected_total{ceiling="${ceiling}"} ${current.rejected[ceiling]}`),
      '',
      `# HELP ${prefix}store_errors_total Counter store round trips that failed`,
      `# TYPE ${prefix}store_errors_total counter`,
      `${prefix}store_errors_total ${current.storeErrors}`,
      '',
      `# HELP ${prefix}cancelled_total Quota operations cancelled by the caller`,
      `# TYPE ${prefix}cancelled_total counter`,
      `${prefix}cancelled_total ${current.cancelled}`,
      '',
    ];
    return lines.join('\n');
  }
}
