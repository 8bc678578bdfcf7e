import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { AnalyzerClient, IMPLICIT_SWEEP_TASK_ID } from '../../../src/hardware/analyzer-client';
import { HardwareRequestError } from '../../../src/hardware/errors';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('AnalyzerClient', () => {
  let client: AnalyzerClient;
  const mockAxiosInstance = {
    get: jest.fn(),
    post: jest.fn(),
    interceptors: {
      request: { use: jest.fn() },
      response: { use: jest.fn() },
    },
  };
  const sweep = { operation: 'sweep' as const, taskId: 'sw-1' };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);
    client = new AnalyzerClient({ baseUrl: 'http://analyzer.test:8002' });
    mockAxiosInstance.get.mockResolvedValueOnce({ data: { status: 'ok' } });
    await client.connect();
  });

  afterEach(async () => {
    await client.disconnect();
  });

  describe('configure', () => {
    it('posts the sweep window', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { configured: true } });
      const config = { wavelength_range: { start_nm: 1540, stop_nm: 1560 }, speed: 20, power: 1 };

      const result = await client.configure(config);

      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/configure', config);
      expect(result).toEqual({ ok: true, value: undefined });
    });

    it('rejects an inverted wavelength range locally', async () => {
      const result = await client.configure({ wavelength_range: { start_nm: 1560, stop_nm: 1540 }, speed: 20, power: 1 });

      expect(result).toEqual({ ok: false, error: { kind: 'validation', message: 'invalid configure params: wavelength_range stop_nm must be greater than start_nm' } });
      expect(mockAxiosInstance.post).not.toHaveBeenCalled();
    });
  });

  it('calibrate posts to the calibration endpoint', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ data: {} });

    expect(await client.calibrate()).toEqual({ ok: true, value: undefined });
    expect(mockAxiosInstance.post).toHaveBeenCalledWith('/calibrate', {});
  });

  describe('submit', () => {
    it('uses the task id the analyzer returns', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { task_id: 'sw-1' } });

      const result = await client.submit('sweep', { wait: false });

      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/sweep/start', { wait: false });
      expect(result).toEqual({ ok: true, value: { operation: 'sweep', taskId: 'sw-1' } });
    });

    it('falls back to the implicit sweep handle for a bare acknowledgement', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { accepted: true } });

      const result = await client.submit('sweep', { wait: true });

      expect(result).toEqual({ ok: true, value: { operation: 'sweep', taskId: IMPLICIT_SWEEP_TASK_ID } });
    });
  });

  describe('poll', () => {
    it.each([
      [{ is_sweeping: false, is_complete: false }, 'pending', 0],
      [{ is_sweeping: true, is_complete: false, progress_percent: 35 }, 'running', 35],
      [{ is_sweeping: false, is_complete: true }, 'completed', 100],
    ])('maps %j to %s', async (payload, status, progress) => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: payload });

      const result = await client.poll(sweep);

      expect(mockAxiosInstance.get).toHaveBeenLastCalledWith('/sweep/status');
      expect(result).toEqual({ ok: true, value: { taskId: 'sw-1', status, progressPercent: progress } });
    });

    it('reports an analyzer error as a failed task', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: { is_sweeping: false, is_complete: false, error: 'laser interlock open' } });

      const result = await client.poll(sweep);

      expect(result).toEqual({ ok: true, value: { taskId: 'sw-1', status: 'failed', progressPercent: 0, error: 'laser interlock open' } });
    });

    it('passes a server fault through as an error value', async () => {
      mockAxiosInstance.get.mockRejectedValueOnce(new HardwareRequestError('hardware_fault', 'HTTP 503: busy', 503, 'busy'));

      expect(await client.poll(sweep)).toEqual({ ok: false, error: { kind: 'hardware_fault', message: 'HTTP 503: busy', status: 503, body: 'busy' } });
    });
  });

  describe('cancel', () => {
    it('aborts a sweep in progress', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: { is_sweeping: true, is_complete: false } });
      mockAxiosInstance.post.mockResolvedValueOnce({ data: {} });

      expect(await client.cancel(sweep)).toEqual({ ok: true, value: undefined });
      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/sweep/abort', {});
    });

    it('refuses to abort a finished sweep', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: { is_sweeping: false, is_complete: true } });

      expect(await client.cancel(sweep)).toEqual({ ok: false, error: { kind: 'validation', message: 'sweep sw-1 already completed' } });
      expect(mockAxiosInstance.post).not.toHaveBeenCalled();
    });
  });

  describe('readTrace', () => {
    it('returns the structured trace', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: { wavelength_nm: [1550, 1551], power_dbm: [-4, -6] } });

      expect(await client.readTrace()).toEqual({ ok: true, value: { wavelengthNm: [1550, 1551], powerDbm: [-4, -6] } });
      expect(mockAxiosInstance.get).toHaveBeenLastCalledWith('/trace');
    });

    it('rejects a payload that is not a trace', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({ data: 'binary-blob' });

      const result = await client.readTrace();

      expect(result.ok ? undefined : result.error.kind).toBe('hardware_fault');
    });
  });
});
