import dotenv from 'dotenv';
import { APIError, BleemeoClient, Graph, Resource } from '../src';

dotenv.config();

async function createDashboard(): Promise<void> {
  const client = BleemeoClient.fromEnv();

  try {
    const dashboard = await client.create(Resource.DASHBOARD, { name: 'My dashboard' }, [
      'id',
      'name',
    ]);
    if (typeof dashboard.data !== 'object' || dashboard.data === null || !('id' in dashboard.data)) {
      throw new Error('Dashboard creation returned no id');
    }
    const dashboardId = String(dashboard.data.id);
    console.log(`Successfully created dashboard (${dashboardId})`);
    console.log(`View it on https://panel.bleemeo.com/dashboard/${dashboardId}`);

    const widget = await client.create(Resource.WIDGET, {
      dashboard: dashboardId,
      title: 'My widget',
      graph: Graph.TEXT,
    });
    console.log('Successfully created widget:', widget.data);
  } catch (error: unknown) {
    if (error instanceof APIError) {
      console.error(`API error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await client.logout();
  }
}

void createDashboard();
