import type { Server } from 'node:http';
import type { CapacityActionResult, DispatcherConfiguration, SelectionResponse } from '@gantry/shared';
import {
  DispatcherSubjects,
  createLogger,
  createNATSClient,
  encodeMessage,
  parseNatsUrl,
  setLogLevel,
  type ConnectedClient,
} from '@gantry/shared';
import { loadConfig, loadFleetFile } from './config/index.js';
import { createDispatcher, type Dispatcher } from './dispatcher.js';
import { CompletionListener } from './events/index.js';
import { createExpressApp, startServer } from './api/index.js';
import { errorMessage } from './errors.js';

const logger = createLogger('dispatcher');

/**
 * Service state
 */
interface ServiceState {
  config: DispatcherConfiguration;
  dispatcher: Dispatcher;
  client: ConnectedClient | null;
  listener: CompletionListener | null;
  httpServer: Server | null;
  isRunning: boolean;
}

let state: ServiceState | null = null;

/**
 * Publish decisions and capacity changes for dashboards
 */
function publishEvents(client: ConnectedClient, dispatcher: Dispatcher, projectId: string): void {
  const publish = (subject: string, payload: unknown) => {
    try {
      client.nc.publish(subject, encodeMessage(payload));
    } catch (error) {
      logger.warn(`Failed to publish on ${subject}: ${errorMessage(error)}`);
    }
  };

  const lifecycleSubject = DispatcherSubjects.lifecycle(projectId);

  dispatcher.selector.on('decision', (response: SelectionResponse) => {
    publish(DispatcherSubjects.decisions(projectId), response);
  });
  dispatcher.lifecycle.on('capacity:started', (result: CapacityActionResult, automatic: boolean) => {
    publish(lifecycleSubject, { event: 'started', automatic, ...result });
  });
  dispatcher.lifecycle.on('capacity:stopped', (result: CapacityActionResult) => {
    publish(lifecycleSubject, { event: 'stopped', ...result });
  });
  dispatcher.lifecycle.on('capacity:failed', (action: string, message: string) => {
    publish(lifecycleSubject, { event: 'failed', action, message });
  });
}

/**
 * Start the dispatcher service
 */
export async function startService(): Promise<void> {
  if (state?.isRunning) {
    throw new Error('Service is already running');
  }

  console.log('Starting Runner Dispatcher...');

  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  console.log(`  Project ID: ${config.projectId}`);
  console.log(`  Fleet file: ${config.fleetFile}`);
  console.log(`  Bandit: ${config.bandit.algorithm}`);
  console.log(`  State backend: ${config.state.backend}`);
  if (config.api.enabled) {
    console.log(`  API Port: ${config.api.port}`);
  }

  let client: ConnectedClient | null = null;

  try {
    const fleet = await loadFleetFile(config.fleetFile);
    console.log(`  Loaded ${fleet.runners.length} runner(s)`);

    if (config.nats.enabled) {
      // Parsed URL only, to avoid logging credentials
      console.log(`Connecting to NATS at ${parseNatsUrl(config.nats.url).server}...`);
      client = await createNATSClient(config.nats);
      console.log('  Connected to NATS');
    }

    const dispatcher = await createDispatcher(config, fleet, {
      js: client?.js,
      logger,
    });

    state = {
      config,
      dispatcher,
      client,
      listener: null,
      httpServer: null,
      isRunning: false,
    };

    if (client) {
      const listener = new CompletionListener(client.nc, config.projectId, dispatcher.selector, logger.child('events'));
      listener.start();
      state.listener = listener;
      console.log(`  Listening for job completions on ${listener.subject}`);

      publishEvents(client, dispatcher, config.projectId);
    }

    dispatcher.lifecycle.start();
    if (dispatcher.lifecycle.configured) {
      console.log(`  Idle shutdown after ${dispatcher.lifecycle.idleShutdownMs}ms`);
    }

    if (config.api.enabled) {
      console.log(`Starting REST API on ${config.api.host}:${config.api.port}...`);
      const app = createExpressApp(config.api, dispatcher, { webhookSecret: config.webhookSecret });
      state.httpServer = await startServer(app, config.api);
      console.log('  REST API started');
    }

    state.isRunning = true;
    console.log('\n=== Runner Dispatcher Ready ===\n');

    // Handle shutdown signals
    const shutdown = async () => {
      console.log('\nShutting down...');
      await stopService();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Failed to start service:', error);
    if (state) {
      state.isRunning = true;
      await stopService();
    } else if (client) {
      await client.close();
    }
    throw error;
  }
}

/**
 * Stop the dispatcher service
 *
 * Capacity that is still running is left alone; the idle timer only
 * lives as long as the process.
 */
export async function stopService(): Promise<void> {
  if (!state?.isRunning) {
    return;
  }

  console.log('Stopping Runner Dispatcher...');

  const current = state;
  current.dispatcher.lifecycle.shutdown();
  current.listener?.stop();

  const httpServer = current.httpServer;
  if (httpServer) {
    await new Promise<void>((resolve) => {
      httpServer.close((err) => {
        if (err) {
          logger.warn(`Error closing REST API: ${err.message}`);
        }
        resolve();
      });
    });
    console.log('  REST API stopped');
  }

  if (current.client) {
    await current.client.close();
    console.log('  NATS connection closed');
  }

  current.isRunning = false;
  state = null;

  console.log('Runner Dispatcher stopped');
}

/**
 * Get service status
 */
export function getServiceStatus(): {
  running: boolean;
  config?: DispatcherConfiguration;
  runnerCount?: number;
  lifecyclePhase?: string;
} {
  return {
    running: state?.isRunning ?? false,
    config: state?.config,
    runnerCount: state?.dispatcher.ontology.size,
    lifecyclePhase: state?.dispatcher.lifecycle.getState().phase,
  };
}

/**
 * Get the running dispatcher (for testing or advanced usage)
 */
export function getDispatcher(): Dispatcher | null {
  return state?.dispatcher ?? null;
}
