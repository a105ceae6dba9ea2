import { loadConfig } from '../config';
import type { Environment } from '../env';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { SengledSession, type SengledSessionOptions } from '../adapters/sengled/SengledSession';
import type { Credentials } from '../adapters/sengled/LoginClient';
import type { LightingPort } from '../ports/devices/LightingPort';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import { parseCommandLine, UsageError } from '../runtime/commandLine';
import { executeCommand, type Sleep } from '../runtime/commands';

export interface LightingSession extends LightingPort {
  close(): Promise<void>;
}

export type SessionConnector = (
  credentials: Credentials,
  options: SengledSessionOptions,
) => Promise<LightingSession>;

export interface ApplicationDependencies {
  connect?: SessionConnector;
  logger?: LoggerPort;
  output?: (line: string) => void;
  sleep?: Sleep;
}

export interface ApplicationInstance {
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

const connectSengled: SessionConnector = (credentials, options) =>
  SengledSession.connect(credentials, options);

export function buildApplication(
  environment: Environment,
  deps: ApplicationDependencies = {},
): ApplicationInstance {
  const log = deps.logger ?? new ConsoleLogger({ scope: 'sengled', debug: environment.DEBUG_MODE });
  const command = parseCommandLine(environment.ARGS);

  const { config: appConfig, path: configPath } = loadConfig(environment.CONFIG_PATH);
  if (configPath) {
    log.info(`Loaded config from ${configPath}`);
  } else if (environment.CONFIG_PATH) {
    log.warn(`Config file ${environment.CONFIG_PATH} not found; proceeding with defaults.`);
  }

  const abort = new AbortController();
  let session: LightingSession | null = null;

  return {
    start: async () => {
      if (command.name === 'help') {
        await executeCommand(unavailableLights, command, {
          config: appConfig,
          log,
          output: deps.output,
        });
        return;
      }

      const username = environment.SENGLED_USER;
      const password = environment.SENGLED_PASS;
      if (!username || !password) {
        throw new UsageError('SENGLED_USER and SENGLED_PASS must be set (environment or .env).');
      }

      const connect = deps.connect ?? connectSengled;
      const connected = await connect({ username, password }, { logger: log });
      if (abort.signal.aborted) {
        await connected.close();
        return;
      }
      session = connected;
      await executeCommand(connected, command, {
        config: appConfig,
        log,
        output: deps.output,
        signal: abort.signal,
        sleep: deps.sleep,
      });
    },
    shutdown: async () => {
      abort.abort();
      const current = session;
      session = null;
      await current?.close();
    },
  };
}

const notConnected = () => Promise.reject(new Error('No Sengled session for this command.'));

const unavailableLights: LightingPort = {
  listDevices: notConnected,
  turnOn: notConnected,
  turnOff: notConnected,
  setBrightness: notConnected,
  setColor: notConnected,
};
