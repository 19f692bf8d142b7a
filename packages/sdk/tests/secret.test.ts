import { MissingSecretFieldError, ScopedSecret, SecretReleasedError } from '../src/secret';

describe('ScopedSecret', () => {
    const make = () =>
        new ScopedSecret('cred-1', { region: 'eu-west-1' }, {
            token: Buffer.from('test-secret'),
            username: Buffer.from('svc-user'),
        });

    test('exposes fields as strings', () => {
        const secret = make();

        expect(secret.field('token')).toBe('test-secret');
        expect(secret.optionalField('password')).toBeUndefined();
        expect(secret.has('username')).toBe(true);
        expect(secret.scope.region).toBe('eu-west-1');
    });

    test('field() throws for a missing field', () => {
        expect(() => make().field('password')).toThrow(MissingSecretFieldError);
    });

    test('release zero-fills the buffers it was built from', () => {
        const source = Buffer.from('test-secret');
        const secret = new ScopedSecret('cred-1', {}, { token: source });
        const transferable = secret.toTransferable();

        secret.release();

        expect(secret.released).toBe(true);
        expect(() => secret.field('token')).toThrow(SecretReleasedError);
        // the secret copies its input, so the caller's buffer is untouched
        expect(source.toString()).toBe('test-secret');
        // and the transferable copy is independent of the released one
        expect(Buffer.from(transferable.fields.token).toString()).toBe('test-secret');
    });

    test('release is idempotent', () => {
        const secret = make();
        secret.release();
        expect(() => secret.release()).not.toThrow();
    });

    test('round-trips through the transferable form', () => {
        const copy = ScopedSecret.fromTransferable(make().toTransferable());

        expect(copy.credentialId).toBe('cred-1');
        expect(copy.field('username')).toBe('svc-user');
    });

    test('never serialises its material', () => {
        expect(JSON.stringify(make())).toBe('{"credentialId":"cred-1","scope":{"region":"eu-west-1"},"fields":"[redacted]"}');
    });
});
