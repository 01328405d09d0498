import 'dotenv/config';
import { runCli } from './run';

runCli(process.argv).then(
  code => { process.exitCode = code; },
  e => { console.error(e); process.exitCode = 1; },
);
