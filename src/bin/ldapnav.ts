import configArgs from '../config/args';
import { configFileCandidates } from '../config/file';

import { LdapNav } from './index';

const usage = (): string => {
  const options = configArgs
    .map(([flag, env, defaultValue]) => {
      const shown = defaultValue === '' ? '' : ` (default: ${String(defaultValue)})`;
      return `  ${flag.padEnd(28)} ${env}${shown}`;
    })
    .join('\n');
  const files = configFileCandidates()
    .map(path => `  ${path}`)
    .join('\n');
  return `Usage: ldapnav [options]

Browse an LDAP directory from the terminal.

Options (environment variable):
${options}

Configuration files, first found wins:
${files}
`;
};

if (process.argv.includes('--help') || process.argv.includes('-h')) {
  process.stdout.write(usage());
} else {
  try {
    const app = new LdapNav();
    app.run().catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
