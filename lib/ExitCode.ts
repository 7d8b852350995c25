import ErrorCode from './ErrorCode';

/**
 * Process exit codes of the `materialize-contract` command.
 */
enum ExitCode {
  Success = 0,
  MissingEnvironmentVariable = 1,
  InvalidContractTemplate = 2,
  FileSystemFailure = 3,
  UnexpectedFailure = 4
}

const exitCodeByErrorCode = new Map<string, ExitCode>([
  [ErrorCode.ConfigEnvironmentVariableMissing, ExitCode.MissingEnvironmentVariable],
  [ErrorCode.ContractFieldMissing, ExitCode.InvalidContractTemplate],
  [ErrorCode.ContractTemplateNotAnObject, ExitCode.InvalidContractTemplate],
  [ErrorCode.ContractTemplateNotJson, ExitCode.InvalidContractTemplate],
  [ErrorCode.ContractTemplateCannotRead, ExitCode.FileSystemFailure],
  [ErrorCode.ContractOutputCannotWrite, ExitCode.FileSystemFailure]
]);

/**
 * Gets the exit code for the given `ErrorCode` value.
 */
export function getExitCode (errorCode: string): ExitCode {
  const exitCode = exitCodeByErrorCode.get(errorCode);
  return exitCode === undefined ? ExitCode.UnexpectedFailure : exitCode;
}

export default ExitCode;
