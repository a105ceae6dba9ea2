import { config } from 'dotenv';

config();

export interface Environment {
  SENGLED_USER?: string;
  SENGLED_PASS?: string;
  DEBUG_MODE: boolean;
  CONFIG_PATH?: string;
  LOG_FILE?: string;
  /** Arguments left after flags were consumed, e.g. `["color", "Desk", "255,0,0"]`. */
  ARGS: string[];
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

export function resolveEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): Environment {
  let debugMode = env.DEBUG_MODE === 'true';
  let configPath: string | undefined;
  let logFile: string | undefined;
  const args: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        if (argv[i + 1]) {
          configPath = argv[++i];
        }
        break;
      case '--log-file':
        if (argv[i + 1]) {
          logFile = argv[++i];
        }
        break;
      case '--debug':
        debugMode = true;
        break;
      case '--no-debug':
        debugMode = false;
        break;
      default:
        if (arg.startsWith('--')) break;
        args.push(arg);
        break;
    }
  }

  return {
    SENGLED_USER: nonEmpty(env.SENGLED_USER),
    SENGLED_PASS: nonEmpty(env.SENGLED_PASS),
    DEBUG_MODE: debugMode,
    CONFIG_PATH: configPath,
    LOG_FILE: logFile,
    ARGS: args,
  };
}
