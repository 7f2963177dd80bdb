import { AxiosError, AxiosInstance } from 'axios';
import { WidgetConfig } from '@/interfaces/widget';

export const createAxiosClient = () =>
  ({ get: jest.fn(), post: jest.fn() } as unknown as AxiosInstance);

export const makeConfig = (overrides: Partial<WidgetConfig> = {}): WidgetConfig => ({
  dataSource: 'api',
  endpointUrl: 'https://api.example.com/data',
  requestHeaders: {},
  templateId: 'key_value',
  fieldMapping: {},
  feedOptions: {},
  timeoutSeconds: 5,
  ...overrides,
});

export const connectionError = (code = 'ECONNREFUSED') =>
  new AxiosError(`connect ${code} 127.0.0.1:8080`, code);

export const httpError = (status: number) =>
  Object.assign(new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE'), {
    response: { status },
  });
