// NOTE: Aliases to classes and interfaces are used for external consumption.

import ContractComposer from './ContractComposer';
import ContractError from './common/ContractError';
import ContractFileStore from './ContractFileStore';
import ContractMaterializer from './ContractMaterializer';
import ContractModel from './models/ContractModel';
import Config, { ConfigKey } from './Config';
import ConfigModel from './models/ConfigModel';
import DatasetModel from './models/DatasetModel';
import Did from './Did';
import ErrorCode from './ErrorCode';
import ExitCode from './ExitCode';
import ILogger from './common/interfaces/ILogger';
import Logger from './common/Logger';
import MaterializationResultModel from './models/MaterializationResultModel';
import { run } from './cli';

export {
  Config,
  ConfigKey,
  ContractComposer,
  ContractError,
  ContractFileStore,
  ContractMaterializer,
  Did,
  ErrorCode,
  ExitCode,
  Logger,
  run
};

export type {
  ConfigModel,
  ContractModel,
  DatasetModel,
  ILogger,
  MaterializationResultModel
};
