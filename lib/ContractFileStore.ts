import * as fs from 'fs';
import ContractError from './common/ContractError';
import ContractModel from './models/ContractModel';
import ErrorCode from './ErrorCode';

/**
 * Reads contract templates from and writes materialized contracts to the file system.
 */
export default class ContractFileStore {
  /**
   * Reads and parses the JSON contract template at the given path.
   * The result is not validated, see `ContractComposer.validateContractTemplate()`.
   */
  public static readTemplate (templatePath: string): unknown {
    let templateContent: string;
    try {
      templateContent = fs.readFileSync(templatePath, 'utf8');
    } catch (error) {
      throw ContractError.createFromError(ErrorCode.ContractTemplateCannotRead, error, `Unable to read contract template '${templatePath}'`);
    }

    try {
      const template: unknown = JSON.parse(templateContent);
      return template;
    } catch (error) {
      throw ContractError.createFromError(ErrorCode.ContractTemplateNotJson, error, `Contract template '${templatePath}' is not valid JSON`);
    }
  }

  /**
   * Writes the contract as single-line JSON, replacing any existing file.
   * The parent directory must already exist.
   */
  public static writeContract (outputPath: string, contract: ContractModel): void {
    const serializedContract = JSON.stringify(contract) + '\n';
    try {
      fs.writeFileSync(outputPath, serializedContract);
    } catch (error) {
      throw ContractError.createFromError(ErrorCode.ContractOutputCannotWrite, error, `Unable to write contract '${outputPath}'`);
    }
  }
}
