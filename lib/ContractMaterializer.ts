import Config from './Config';
import ContractComposer from './ContractComposer';
import ContractFileStore from './ContractFileStore';
import Did from './Did';
import LogColor from './common/LogColor';
import Logger from './common/Logger';
import MaterializationResultModel from './models/MaterializationResultModel';

/**
 * Materializes the demo contract: validates the environment, derives the participant DIDs,
 * fills the contract template and writes the result to the staging location.
 */
export default class ContractMaterializer {
  /** Template read when no path is given, relative to the working directory. */
  public static readonly defaultTemplatePath = 'demo/contract/contract.json';

  /** Staging location written when no path is given, relative to the working directory. */
  public static readonly defaultOutputPath = './tmp/contracts/contract.json';

  public constructor (
    private templatePath: string = ContractMaterializer.defaultTemplatePath,
    private outputPath: string = ContractMaterializer.defaultOutputPath) {
  }

  /**
   * Runs the whole pipeline against the given environment.
   * Any failure is thrown before the output file is touched.
   */
  public materialize (environment: NodeJS.ProcessEnv): MaterializationResultModel {
    const config = Config.fromEnvironment(environment);

    const providerDid = Did.fromGithubUsername(config.providerUsername);
    const consumerDid = Did.fromGithubUsername(config.consumerUsername);

    const template = ContractFileStore.readTemplate(this.templatePath);
    ContractComposer.validateContractTemplate(template);
    const contract = ContractComposer.compose(template, providerDid, consumerDid, config.keyVaultEndpoint);

    ContractFileStore.writeContract(this.outputPath, contract);
    Logger.info(LogColor.lightBlue(`Contract written to ${LogColor.green(this.outputPath)}.`));

    return { providerDid, consumerDid, contract };
  }

  /**
   * Gets the derived values under the environment variable names later workflow steps read.
   */
  public static getDerivedEnvironmentVariables (result: MaterializationResultModel): { TDP_DID: string, TDC_DID: string } {
    return {
      TDP_DID: result.providerDid,
      TDC_DID: result.consumerDid
    };
  }
}
