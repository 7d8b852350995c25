#!/usr/bin/env node
import ContractError from './common/ContractError';
import ContractMaterializer from './ContractMaterializer';
import ExitCode, { getExitCode } from './ExitCode';
import LogColor from './common/LogColor';
import Logger from './common/Logger';

/**
 * Runs the `materialize-contract` command and returns the process exit code.
 */
export function run (environment: NodeJS.ProcessEnv, materializer: ContractMaterializer = new ContractMaterializer()): ExitCode {
  try {
    const result = materializer.materialize(environment);

    const derivedVariables = ContractMaterializer.getDerivedEnvironmentVariables(result);
    for (const [name, value] of Object.entries(derivedVariables)) {
      Logger.info(`${name}=${value}`);
    }

    return ExitCode.Success;
  } catch (error) {
    if (error instanceof ContractError) {
      Logger.error(LogColor.red(error.message));
      return getExitCode(error.code);
    }

    Logger.error(LogColor.red(`Unexpected error: ${ContractError.stringify(error)}`));
    return ExitCode.UnexpectedFailure;
  }
}

if (require.main === module) {
  process.exitCode = run(process.env);
}
