import DatasetModel from './DatasetModel';

/**
 * Data model of a contract document.
 */
export default interface ContractModel {
  /** DID of the trusted data consumer. */
  tdc?: string;
  /** DIDs of the trusted data providers; the first entry is the primary provider. */
  tdps: unknown[];
  datasets: DatasetModel[];
  [property: string]: unknown;
}
