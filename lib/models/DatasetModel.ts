/**
 * Data model of a dataset entry in a contract.
 * Only the fields the materializer writes are typed; everything else passes through untouched.
 */
export default interface DatasetModel {
  provider?: string;
  key: {
    properties: {
      endpoint?: string;
      [property: string]: unknown;
    };
    [property: string]: unknown;
  };
  [property: string]: unknown;
}
