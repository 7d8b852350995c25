import ConfigModel from './models/ConfigModel';
import ContractError from './common/ContractError';
import ErrorCode from './ErrorCode';

/**
 * This enum contains the names of all the environment variables read.
 */
export enum ConfigKey {
  ProviderUsername = 'TDP_USERNAME',
  KeyVaultEndpoint = 'TDP_KEYVAULT',
  ConsumerUsername = 'TDC_USERNAME'
}

const missingValueDescriptions: { [configKey in ConfigKey]: string } = {
  [ConfigKey.ProviderUsername]: 'No TDP username specified',
  [ConfigKey.KeyVaultEndpoint]: 'No TDP key vault specified',
  [ConfigKey.ConsumerUsername]: 'No TDC username specified'
};

/**
 * Loads the configuration from environment variables.
 */
export default class Config {
  /**
   * Reads all required values from the given environment, in the order of `ConfigKey`.
   * An empty string counts as not set.
   */
  public static fromEnvironment (environment: NodeJS.ProcessEnv): ConfigModel {
    const providerUsername = Config.getRequiredValue(environment, ConfigKey.ProviderUsername);
    const keyVaultEndpoint = Config.getRequiredValue(environment, ConfigKey.KeyVaultEndpoint);
    const consumerUsername = Config.getRequiredValue(environment, ConfigKey.ConsumerUsername);

    return { providerUsername, keyVaultEndpoint, consumerUsername };
  }

  private static getRequiredValue (environment: NodeJS.ProcessEnv, configKey: ConfigKey): string {
    const value = environment[configKey];
    if (value === undefined || value === '') {
      throw new ContractError(
        ErrorCode.ConfigEnvironmentVariableMissing,
        `${missingValueDescriptions[configKey]}: environment variable '${configKey}' is not set.`
      );
    }

    return value;
  }
}
