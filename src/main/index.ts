import { EXIT_FAILURE, runCli } from './run';

runCli(process.argv.slice(2), { stdout: process.stdout, stdin: process.stdin })
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('Unexpected error:', err);
    process.exitCode = EXIT_FAILURE;
  });
