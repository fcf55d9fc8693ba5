import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { ChartApiMarketDataProvider } from '../../services/marketData';

function chartPayload(closes: Array<number | null>) {
  return { chart: { result: [{ indicators: { quote: [{ close: closes }] } }] } };
}

function respondWith(data: unknown, requests: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    requests.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
}

function createProvider(adapter: AxiosAdapter): ChartApiMarketDataProvider {
  return new ChartApiMarketDataProvider({ baseUrl: 'https://charts.example.test', timeoutMs: 1000, adapter });
}

describe('ChartApiMarketDataProvider', () => {
  describe('getLastClose', () => {
    it('should return the latest close, skipping missing sessions', async () => {
      const requests: InternalAxiosRequestConfig[] = [];
      const provider = createProvider(respondWith(chartPayload([30.1, 35.2, null]), requests));

      expect(await provider.getLastClose('^VIX')).toBe(35.2);
      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe('/v8/finance/chart/%5EVIX');
      expect(requests[0].params).toEqual({ range: '5d', interval: '1d' });
    });

    it('should return null for an empty result', async () => {
      const provider = createProvider(respondWith({ chart: { result: null } }));
      expect(await provider.getLastClose('^VIX')).toBeNull();
    });

    it('should return null for an unexpected payload', async () => {
      const provider = createProvider(respondWith({ error: 'Not Found' }));
      expect(await provider.getLastClose('^VIX')).toBeNull();
    });

    it('should return null when the request fails', async () => {
      const provider = createProvider(async () => {
        throw new Error('socket hang up');
      });
      expect(await provider.getLastClose('^VIX')).toBeNull();
    });
  });

  describe('getHistoricalChange', () => {
    it('should compare the latest close with the close 60 observations back', async () => {
      const closes = Array.from({ length: 70 }, (_, i) => (i === 10 ? 100 : i === 69 ? 80 : 90));
      const requests: InternalAxiosRequestConfig[] = [];
      const provider = createProvider(respondWith(chartPayload(closes), requests));

      expect(await provider.getHistoricalChange('^N225', 60)).toBe(-20);
      expect(requests[0].params).toEqual({ range: '6mo', interval: '1d' });
    });

    it('should return null when the history is too short', async () => {
      const closes = Array.from({ length: 30 }, () => 100);
      const provider = createProvider(respondWith(chartPayload(closes)));

      expect(await provider.getHistoricalChange('^GSPC', 60)).toBeNull();
    });

    it('should return null for a zero reference close', async () => {
      const closes = Array.from({ length: 60 }, (_, i) => (i === 0 ? 0 : 100));
      const provider = createProvider(respondWith(chartPayload(closes)));

      expect(await provider.getHistoricalChange('^GSPC', 60)).toBeNull();
    });
  });
});
