import { applyPatch, JsonPatchError, Operation } from 'fast-json-patch';
import ContractError from './common/ContractError';
import ContractModel from './models/ContractModel';
import ErrorCode from './ErrorCode';

/**
 * Class that fills a contract template with participant identifiers.
 */
export default class ContractComposer {
  /**
   * Validates that the given parsed template has every field `compose()` writes into.
   */
  public static validateContractTemplate (input: unknown): asserts input is ContractModel {
    if (!ContractComposer.isObject(input)) {
      throw new ContractError(ErrorCode.ContractTemplateNotAnObject, 'Contract template must be a JSON object.');
    }

    const tdps = input.tdps;
    if (!Array.isArray(tdps) || tdps.length === 0) {
      throw new ContractError(ErrorCode.ContractFieldMissing, `Contract template is missing field 'tdps[0]'.`);
    }

    const datasets = input.datasets;
    if (!Array.isArray(datasets)) {
      throw new ContractError(ErrorCode.ContractFieldMissing, `Contract template is missing field 'datasets'.`);
    }

    datasets.forEach((dataset: unknown, index: number) => {
      const key = ContractComposer.isObject(dataset) ? dataset.key : undefined;
      if (!ContractComposer.isObject(key) || !ContractComposer.isObject(key.properties)) {
        throw new ContractError(ErrorCode.ContractFieldMissing, `Contract template is missing field 'datasets[${index}].key.properties'.`);
      }
    });
  }

  /**
   * Sets the consumer DID, the primary provider DID, and the provider DID and key vault endpoint of every dataset.
   * NOTE: a new contract is returned, the template is not modified.
   */
  public static compose (template: ContractModel, providerDid: string, consumerDid: string, keyVaultEndpoint: string): ContractModel {
    const patches: Operation[] = [
      { op: 'add', path: '/tdc', value: consumerDid },
      { op: 'replace', path: '/tdps/0', value: providerDid }
    ];

    for (let index = 0; index < template.datasets.length; index++) {
      patches.push({ op: 'add', path: `/datasets/${index}/provider`, value: providerDid });
    }

    for (let index = 0; index < template.datasets.length; index++) {
      patches.push({ op: 'add', path: `/datasets/${index}/key/properties/endpoint`, value: keyVaultEndpoint });
    }

    return ContractComposer.applyPatches(template, patches);
  }

  private static applyPatches (template: ContractModel, patches: Operation[]): ContractModel {
    const validatePatchOperation = true;
    const mutateDocument = false;
    try {
      const patchResult = applyPatch(template, patches, validatePatchOperation, mutateDocument);
      return patchResult.newDocument;
    } catch (error) {
      if (error instanceof JsonPatchError) {
        throw ContractError.createFromError(ErrorCode.ContractFieldMissing, error, 'Contract field cannot be set');
      }

      throw error;
    }
  }

  private static isObject (input: unknown): input is { [property: string]: unknown } {
    return typeof input === 'object' && input !== null && !Array.isArray(input);
  }
}
