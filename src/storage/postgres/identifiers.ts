const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteIdentifier(name: string): string {
    if (!PLAIN_IDENTIFIER.test(name)) throw new Error(`invalid-identifier: ${name}`);
    return `"${name}"`;
}
