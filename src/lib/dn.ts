/**
 * Distinguished name helpers
 */

/**
 * Split a DN on unescaped commas
 */
export function splitDN(dn: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < dn.length; i++) {
    const c = dn[i];
    if (c === '\\' && i + 1 < dn.length) {
      current += c + dn[i + 1];
      i++;
    } else if (c === ',') {
      parts.push(current.trim());
      current = '';
    } else {
      current += c;
    }
  }
  if (current.trim() !== '' || parts.length > 0) parts.push(current.trim());
  return parts;
}

/**
 * Leading RDN of `dn`, used as the node label under its parent.
 * The parent itself (or an empty DN) keeps its full DN.
 */
export function rdnName(dn: string, parentDN = ''): string {
  if (dn === '' || sameDN(dn, parentDN)) return dn;
  return splitDN(dn)[0] ?? dn;
}

export function sameDN(a: string, b: string): boolean {
  const x = splitDN(a);
  const y = splitDN(b);
  return (
    x.length === y.length &&
    x.every((rdn, i) => rdn.toLowerCase() === y[i].toLowerCase())
  );
}
