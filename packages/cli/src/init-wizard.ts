import { input, password, select, confirm } from '@inquirer/prompts';
import { USER_CONFIG_DEFAULTS } from '@fieldlink/shared/config-schema';
import type { LogLevelName } from '@fieldlink/shared/config-schema';
import type { ConfigStore } from './config-commands.js';
import fs from 'node:fs';

interface InitOptions {
  /** Skip prompts and use defaults */
  yes: boolean;
  store: ConfigStore;
}

function validateUrl(value: string): string | true {
  if (value.trim() === '') return true;
  try {
    new URL(value);
    return true;
  } catch {
    return 'Enter a full URL such as https://fleet.example.com/';
  }
}

/** Empty answers mean "not set". */
function orNull(value: string): string | null {
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/** Interactive setup of the service connection and logging. */
export async function runInitWizard(options: InitOptions): Promise<void> {
  const { yes, store } = options;

  if (yes) {
    store.reset();
    console.log(`Config initialized with defaults at ${store.path}`);
    return;
  }

  if (fs.existsSync(store.path)) {
    const overwrite = await confirm({
      message: 'Config already exists. Overwrite with new settings?',
      default: false,
    });
    if (!overwrite) {
      console.log('Aborted.');
      return;
    }
  }

  console.log('\nfieldlink setup\n');

  const url = await input({
    message: 'Fleet service URL:',
    validate: validateUrl,
  });

  const token = await password({
    message: 'API token (leave empty to use FIELDLINK_API_TOKEN):',
    mask: true,
  });

  const project = await input({
    message: 'Default project subdomain (leave empty for none):',
    default: '',
  });

  const directoryUrl = await input({
    message: 'Directory service URL (leave empty to use the fleet URL):',
    default: '',
    validate: validateUrl,
  });

  const level = await select<LogLevelName>({
    message: 'Log level:',
    choices: [
      { value: 'warn', name: 'Warnings and errors' },
      { value: 'info', name: 'Info' },
      { value: 'debug', name: 'Debug (logs every request)' },
    ],
    default: USER_CONFIG_DEFAULTS.logging.level,
  });

  store.reset();
  store.setDot('api.url', orNull(url));
  store.setDot('api.token', orNull(token));
  store.setDot('api.project', orNull(project));
  store.setDot('api.directoryUrl', orNull(directoryUrl));
  store.setDot('logging.level', level);

  console.log(`\nConfig saved to ${store.path}`);
}
