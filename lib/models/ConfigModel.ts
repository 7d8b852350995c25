/**
 * Defines all the configuration values needed to materialize a contract.
 */
export default interface ConfigModel {
  providerUsername: string;
  keyVaultEndpoint: string;
  consumerUsername: string;
}
