import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { toJSONSchema } from 'zod';

import {
  buildWeatherFallback,
  createOpenWeatherClient,
  createWeatherTool,
  type WeatherClient,
} from '../weather.js';
import type { FetchFn } from '../travel-search.js';

class RecordingWeatherClient implements WeatherClient {
  readonly locations: string[] = [];

  constructor(private readonly outcome: unknown) {}

  async getForecast(location: string): Promise<unknown> {
    this.locations.push(location);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

describe('buildWeatherFallback', () => {
  it('describes the outage and carries placeholder conditions', () => {
    assert.deepStrictEqual(buildWeatherFallback('Tokyo'), {
      error: 'Weather service temporarily unavailable for Tokyo',
      fallback: {
        location: 'Tokyo',
        current: { temp: 295.15, description: 'partly cloudy' },
        message: 'Using fallback data',
      },
    });
  });
});

describe('createWeatherTool', () => {
  it('creates a tool with default id "get_weather_info"', () => {
    const tool = createWeatherTool({ client: new RecordingWeatherClient({}) });
    assert.strictEqual(tool.id, 'get_weather_info');
  });

  it('has no required parameters', () => {
    const tool = createWeatherTool({ client: new RecordingWeatherClient({}) });
    const schema = toJSONSchema(tool.toDescriptor().inputSchema);

    assert.ok('location' in (schema.properties ?? {}));
    assert.ok(!schema.required || schema.required.length === 0);
  });

  it('defaults the location to the destination', async () => {
    const client = new RecordingWeatherClient({ cod: '200' });
    const tool = createWeatherTool({ client, destination: 'Osaka' });

    await tool.execute('{}');
    await tool.execute('{"location":"  "}');

    assert.deepStrictEqual(client.locations, ['Osaka', 'Osaka']);
  });

  it('returns the forecast as indented JSON', async () => {
    const forecast = { city: { name: 'Tokyo' }, list: [{ main: { temp: 290.5 } }] };
    const tool = createWeatherTool({ client: new RecordingWeatherClient(forecast) });

    const output = await tool.execute('{"location":"Tokyo"}');

    assert.strictEqual(output, JSON.stringify(forecast, null, 2));
  });

  it('returns the fallback payload when the client fails', async () => {
    const tool = createWeatherTool({
      client: new RecordingWeatherClient(new Error('connect ECONNREFUSED')),
    });

    const output = await tool.execute('{"location":"Shibuya"}');

    assert.deepStrictEqual(JSON.parse(output), buildWeatherFallback('Shibuya'));
  });
});

describe('createOpenWeatherClient', () => {
  it('requests the forecast for the location', async () => {
    const urls: string[] = [];
    const fetchFn: FetchFn = async (url) => {
      urls.push(url);
      return new Response(JSON.stringify({ cod: '200', list: [] }), { status: 200 });
    };
    const client = createOpenWeatherClient({ apiKey: 'test-secret', fetch: fetchFn });

    const data = await client.getForecast('Tokyo');

    assert.deepStrictEqual(data, { cod: '200', list: [] });
    assert.deepStrictEqual(urls, [
      'https://api.openweathermap.org/data/2.5/forecast?q=Tokyo&appid=test-secret',
    ]);
  });

  it('throws on a non-2xx response', async () => {
    const fetchFn: FetchFn = async () => new Response('city not found', { status: 404 });
    const client = createOpenWeatherClient({ apiKey: 'test-secret', fetch: fetchFn });

    await assert.rejects(client.getForecast('Atlantis'), {
      message: 'OpenWeather API error (404): city not found',
    });
  });

  it('throws without an API key', async () => {
    const originalKey = process.env['OPENWEATHER_API_KEY'];
    delete process.env['OPENWEATHER_API_KEY'];

    try {
      const client = createOpenWeatherClient();
      await assert.rejects(client.getForecast('Tokyo'), /OpenWeather API key is required/);
    } finally {
      if (originalKey !== undefined) {
        process.env['OPENWEATHER_API_KEY'] = originalKey;
      }
    }
  });
});
