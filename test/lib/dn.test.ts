import { expect } from 'chai';

import { rdnName, sameDN, splitDN } from '../../src/lib/dn';

describe('DN helpers', () => {
  it('splitDN should split on unescaped commas only', () => {
    expect(splitDN('cn=Doe\\, John,ou=people, dc=example')).to.deep.equal([
      'cn=Doe\\, John',
      'ou=people',
      'dc=example',
    ]);
    expect(splitDN('')).to.deep.equal([]);
  });

  it('rdnName should keep the leading RDN under a parent', () => {
    expect(rdnName('ou=people,dc=example,dc=com', 'dc=example,dc=com')).to.equal(
      'ou=people'
    );
  });

  it('rdnName should keep the full DN of the parent itself', () => {
    expect(rdnName('dc=example,dc=com', 'DC=Example, DC=com')).to.equal(
      'dc=example,dc=com'
    );
    expect(rdnName('')).to.equal('');
  });

  it('sameDN should ignore case and spaces around separators', () => {
    expect(sameDN('ou=People, dc=example', 'OU=people,dc=EXAMPLE')).to.be.true;
    expect(sameDN('ou=people,dc=example', 'ou=groups,dc=example')).to.be.false;
    expect(sameDN('dc=example', 'ou=people,dc=example')).to.be.false;
  });
});
