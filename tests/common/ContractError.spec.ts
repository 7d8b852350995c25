import ContractError from '../../lib/common/ContractError';

describe('ContractError', () => {
  describe('createFromError', () => {
    it('should create with given message', () => {
      const actual = ContractError.createFromError('code', new Error('This is the message'));
      expect(actual.code).toEqual('code');
      expect(actual.message).toEqual('This is the message');
    });

    it('should create use code as the message if message is not passed in', () => {
      const actual = ContractError.createFromError('code', new Error());
      expect(actual.code).toEqual('code');
      expect(actual.message).toEqual('code');
    });

    it('should prefix the message with the given context', () => {
      const actual = ContractError.createFromError('code', new Error('denied'), 'Unable to write');
      expect(actual.message).toEqual('Unable to write: denied');
    });

    it('should use the context alone if the error has no message', () => {
      const actual = ContractError.createFromError('code', new Error(), 'Unable to write');
      expect(actual.message).toEqual('Unable to write');
    });

    it('should convert a thrown non-error value into the message', () => {
      const actual = ContractError.createFromError('code', 'plain string');
      expect(actual.message).toEqual('plain string');
    });
  });

  describe('stringify', () => {
    it('should include the message and code of a ContractError', () => {
      const error = new ContractError('some_code', 'Some message.');
      const parsed = JSON.parse(ContractError.stringify(error));
      expect(parsed.code).toEqual('some_code');
      expect(parsed.message).toEqual('Some message.');
    });

    it('should convert a non-error value into a string', () => {
      expect(ContractError.stringify(42)).toEqual('42');
    });
  });

  it('should be an instance of both Error and ContractError', () => {
    const error = new ContractError('some_code');
    expect(error instanceof Error).toBeTruthy();
    expect(error instanceof ContractError).toBeTruthy();
    expect(error.message).toEqual('some_code');
  });
});
