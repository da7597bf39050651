import { Injectable } from '@nestjs/common';
import * as client from 'prom-client';

@Injectable()
export class PrometheusService {
  private registry: client.Registry;
  private counters: Map<string, client.Counter<string>>;
  private histograms: Map<string, client.Histogram<string>>;

  constructor() {
    // Private registry with the default process metrics
    this.registry = new client.Registry();
    client.collectDefaultMetrics({
      register: this.registry,
      prefix: 'app_',
    });

    this.counters = new Map();
    this.histograms = new Map();

    this.registerCommandMetrics();
    this.registerQueryMetrics();
    this.registerApiMetrics();
    this.registerTransactionMetrics();
    this.registerAccountMetrics();
  }

  private registerCommandMetrics(): void {
    this.createCounter('commands_total', 'Total commands executed', [
      'command',
      'status',
    ]);

    this.createHistogram(
      'command_duration_seconds',
      'Command execution time in seconds',
      ['command'],
      {
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      },
    );
  }

  private registerQueryMetrics(): void {
    this.createCounter('queries_total', 'Total queries executed', [
      'query',
      'status',
    ]);

    this.createHistogram(
      'query_duration_seconds',
      'Query execution time in seconds',
      ['query'],
      {
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      },
    );
  }

  private registerApiMetrics(): void {
    this.createCounter('api_requests_total', 'Total API requests', [
      'path',
      'method',
      'operation',
    ]);
  }

  private registerTransactionMetrics(): void {
    this.createCounter('transactions_total', 'Transfers by final status', [
      'status',
    ]);

    // Amounts in currency units; the buckets are coarse on purpose
    this.createHistogram(
      'transaction_amount_distribution',
      'Distribution of completed transfer amounts',
      [],
      {
        buckets: [10, 50, 100, 500, 1000, 5000, 10000],
      },
    );
  }

  private registerAccountMetrics(): void {
    this.createCounter('account_operations_total', 'Total account operations', [
      'operation_type',
      'status',
    ]);
  }

  public createCounter(
    name: string,
    help: string,
    labelNames: string[],
  ): client.Counter<string> {
    const fullName = `app_${name}`;
    const existing = this.counters.get(fullName);
    if (existing) return existing;

    const counter = new client.Counter({
      name: fullName,
      help,
      labelNames,
      registers: [this.registry],
    });
    this.counters.set(fullName, counter);
    return counter;
  }

  public createHistogram(
    name: string,
    help: string,
    labelNames: string[],
    options?: Omit<
      client.HistogramConfiguration<string>,
      'name' | 'help' | 'labelNames' | 'registers'
    >,
  ): client.Histogram<string> {
    const fullName = `app_${name}`;
    const existing = this.histograms.get(fullName);
    if (existing) return existing;

    const histogram = new client.Histogram({
      name: fullName,
      help,
      labelNames,
      ...options,
      registers: [this.registry],
    });
    this.histograms.set(fullName, histogram);
    return histogram;
  }

  public getCounter(name: string): client.Counter<string> {
    const counter = this.counters.get(`app_${name}`);
    if (!counter) {
      throw new Error(`Counter app_${name} is not registered`);
    }
    return counter;
  }

  public getHistogram(name: string): client.Histogram<string> {
    const histogram = this.histograms.get(`app_${name}`);
    if (!histogram) {
      throw new Error(`Histogram app_${name} is not registered`);
    }
    return histogram;
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
