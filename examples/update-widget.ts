import dotenv from 'dotenv';
import { APIError, BleemeoClient, Resource, loadConfigFromEnv } from '../src';

dotenv.config();

async function updateWidget(): Promise<void> {
  await BleemeoClient.withClient(loadConfigFromEnv(), async (client) => {
    let widgetId: string | undefined;
    for await (const widget of client.iterate(Resource.WIDGET, { title: 'My widget', fields: 'id' })) {
      widgetId = String(widget.id);
      break;
    }
    if (!widgetId) {
      console.log('Widget not found');
      return;
    }

    const updated = await client.update(
      Resource.WIDGET,
      widgetId,
      { title: 'This is my widget' },
      ['id', 'dashboard']
    );
    console.log('Successfully updated widget:', updated.data);
  });
}

updateWidget().catch((error: unknown) => {
  if (error instanceof APIError) {
    console.error(`API error: ${error.message}:\n${JSON.stringify(error.body)}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
