import dotenv from 'dotenv';
import { APIError, BleemeoClient, Resource, loadConfigFromEnv } from '../src';

// Load BLEEMEO_* variables from .env
dotenv.config();

const MAX_SHOWN = 200;

async function listMetrics(): Promise<void> {
  await BleemeoClient.withClient(loadConfigFromEnv(), async (client) => {
    let count = 0;
    for await (const metric of client.iterate(Resource.METRIC, { active: true })) {
      count += 1;
      if (count <= MAX_SHOWN) {
        console.log(`-> ${String(metric.label)} (${String(metric.id)})`);
      } else if (count === MAX_SHOWN + 1) {
        console.log(`Listing has more than ${MAX_SHOWN} metrics, only the first ${MAX_SHOWN} are shown`);
      }
    }
    console.log(`Successfully retrieved ${count} metrics from API`);
  });
}

listMetrics().catch((error: unknown) => {
  if (error instanceof APIError) {
    console.error(`API error: ${error.message}:\n${JSON.stringify(error.body)}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
