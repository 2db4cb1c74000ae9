import { AllowListAuthorizationGate } from '../../services/feeds/authorization';

const GOVERNANCE = '0x' + 'ab'.repeat(20);

describe('AllowListAuthorizationGate', () => {
  const gate = new AllowListAuthorizationGate([GOVERNANCE]);

  it('should authorize listed addresses regardless of case', async () => {
    await expect(gate.isAuthorized(GOVERNANCE)).resolves.toBe(true);
    await expect(gate.isAuthorized('0x' + 'AB'.repeat(20))).resolves.toBe(true);
  });

  it('should refuse other addresses', async () => {
    await expect(gate.isAuthorized('0x' + 'cd'.repeat(20))).resolves.toBe(false);
  });

  it('should refuse values that are not addresses', async () => {
    await expect(gate.isAuthorized('governance')).resolves.toBe(false);
  });
});
