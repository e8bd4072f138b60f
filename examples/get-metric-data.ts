import dotenv from 'dotenv';
import { APIError, BleemeoClient, Resource } from '../src';

dotenv.config();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function getMetricData(): Promise<void> {
  const client = BleemeoClient.fromEnv();

  try {
    const page = await client.getPage(Resource.METRIC, {
      page: 1,
      pageSize: 1,
      params: { active: true },
    });
    const results = isRecord(page.data) && Array.isArray(page.data.results) ? page.data.results : [];
    const metric: unknown = results[0];
    if (!isRecord(metric)) {
      console.log('No metric found');
      return;
    }

    const data = await client.do('GET', `${Resource.METRIC}${String(metric.id)}/data/`);
    const values = isRecord(data.data) && Array.isArray(data.data.values) ? data.data.values : [];
    console.log(`Found ${values.length} data points for metric '${String(metric.label)}'`);
  } catch (error: unknown) {
    if (error instanceof APIError) {
      console.error(`API error: ${error.message}:\n${JSON.stringify(error.body)}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await client.logout();
  }
}

void getMetricData();
