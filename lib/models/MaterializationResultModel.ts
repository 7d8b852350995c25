import ContractModel from './ContractModel';

/**
 * Outcome of a successful contract materialization.
 */
export default interface MaterializationResultModel {
  providerDid: string;
  consumerDid: string;
  contract: ContractModel;
}
