/**
 * Error codes used by the contract materializer.
 */
export default {
  ConfigEnvironmentVariableMissing: 'config_environment_variable_missing',
  ContractFieldMissing: 'contract_field_missing',
  ContractOutputCannotWrite: 'contract_output_cannot_write',
  ContractTemplateCannotRead: 'contract_template_cannot_read',
  ContractTemplateNotAnObject: 'contract_template_not_an_object',
  ContractTemplateNotJson: 'contract_template_not_json'
};
