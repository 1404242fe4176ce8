import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { hideBin } from 'yargs/helpers';
import { runCli } from './app.ts';

const code = await runCli(hideBin(process.argv), {
  stderr: text => {
    process.stderr.write(text);
  },
  transport: () => new StdioServerTransport()
});
if (code !== 0) {
  process.exit(code);
}
