import http from 'node:http';
import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { err, ok } from '../core/result';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { HardwareRequestError, hardwareError, toHardwareError } from './errors';
import type { HardwareClientOptions, HardwareResult } from './types';

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Shared HTTP plumbing for instrument clients: one keep-alive connection
 * pool per instrument, error normalisation and response validation.
 * Every public method resolves to a `Result`; nothing here throws.
 */
export abstract class BaseHardwareClient {
  abstract readonly name: string;

  protected http: AxiosInstance;
  private agent: http.Agent;
  private connected = false;

  constructor(
    options: HardwareClientOptions,
    protected logger: Logger = silentLogger,
  ) {
    this.agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 10000,
      headers: {
        Accept: 'application/json',
        'User-Agent': 'photon-bench',
      },
      httpAgent: this.agent,
    });

    this.setupInterceptors();
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Health check against the instrument service; required before any other call */
  async connect(): Promise<HardwareResult<void>> {
    try {
      await this.http.get('/health');
      this.connected = true;
      this.logger.debug(`${this.name} connected`);
      return ok(undefined);
    } catch (error) {
      const failure = toHardwareError(error);
      return err({ ...failure, message: `${this.name} health check failed: ${failure.message}` });
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.agent.destroy();
  }

  /** Instantaneous read with no task indirection, e.g. a power meter */
  async readScalar(path: string, field?: string): Promise<HardwareResult<number>> {
    const result = await this.get(path, z.unknown());
    if (!result.ok) return result;

    const value = extractScalar(result.value, field);
    if (value === undefined) {
      return err(hardwareError('hardware_fault', `no numeric value at ${path}${field ? ` (${field})` : ''}`));
    }
    return ok(value);
  }

  protected get<T>(url: string, schema: ResponseSchema<T>): Promise<HardwareResult<T>> {
    return this.send(`GET ${url}`, () => this.http.get<unknown>(url), schema);
  }

  protected post<T>(url: string, body: unknown, schema: ResponseSchema<T>): Promise<HardwareResult<T>> {
    return this.send(`POST ${url}`, () => this.http.post<unknown>(url, body), schema);
  }

  protected validateParams<T>(schema: ResponseSchema<T>, params: unknown, what: string): HardwareResult<T> {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      return err(hardwareError('validation', `invalid ${what} params: ${formatIssues(parsed.error)}`));
    }
    return ok(parsed.data);
  }

  /** Requests are logged at debug level; the logger's level decides whether they show */
  private setupInterceptors(): void {
    this.http.interceptors.request.use((config) => {
      this.logger.debug(`[${this.name}] ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    this.http.interceptors.response.use(
      (response) => response,
      async (error: AxiosError) => {
        throw HardwareRequestError.fromAxiosError(error);
      },
    );
  }

  private async send<T>(label: string, call: () => Promise<AxiosResponse<unknown>>, schema: ResponseSchema<T>): Promise<HardwareResult<T>> {
    if (!this.connected) {
      return err(hardwareError('transport', 'client not connected'));
    }

    try {
      const { data } = await call();
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return err(hardwareError('hardware_fault', `unexpected response from ${label}: ${formatIssues(parsed.error)}`));
      }
      return ok(parsed.data);
    } catch (error) {
      return err(toHardwareError(error));
    }
  }
}

function extractScalar(data: unknown, field?: string): number | undefined {
  if (typeof data === 'number') return Number.isFinite(data) ? data : undefined;
  if (!data || typeof data !== 'object') return undefined;

  const entries = Object.entries(data);
  const candidates = field ? entries.filter(([key]) => key === field) : entries;
  const hit = candidates.find((entry): entry is [string, number] => typeof entry[1] === 'number' && Number.isFinite(entry[1]));
  return hit?.[1];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');
}
