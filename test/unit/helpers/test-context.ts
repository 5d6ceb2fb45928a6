import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  EnvironmentVariables,
  validateEnvironment,
} from '../../../src/config/environment';

export const createTestConfig = (
  overrides: Record<string, unknown> = {},
): ConfigService<EnvironmentVariables, true> =>
  new ConfigService<EnvironmentVariables, true>(validateEnvironment(overrides));

// real client, requests are stubbed per test with jest.spyOn
export const createHttpService = (): HttpService => new HttpService(axios.create());

export const axiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'ERROR',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

export const createTempDir = (prefix: string): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export const removeDir = (dir: string): Promise<void> =>
  fs.rm(dir, { recursive: true, force: true });

export const readJson = async (filePath: string): Promise<unknown> => {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return parsed;
};

export const writeJson = async (filePath: string, data: unknown): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
};
