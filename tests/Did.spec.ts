import Did from '../lib/Did';

describe('Did', () => {
  describe('fromGithubUsername()', () => {
    it('should build the did:web identifier hosted on the user GitHub Pages domain.', () => {
      expect(Did.fromGithubUsername('alice')).toEqual('did:web:alice.github.io');
    });

    it('should use the username verbatim.', () => {
      const usernames = ['Bob', 'carol-smith', 'dave.example', 'user_1'];
      for (const username of usernames) {
        expect(Did.fromGithubUsername(username)).toEqual('did:web:' + username + '.github.io');
      }
    });
  });
});
