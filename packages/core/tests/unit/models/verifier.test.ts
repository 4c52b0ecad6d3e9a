import { describe, expect, it } from 'vitest';
import { Verifier, parseVerification } from '../../../src/models/verifier.js';
import { ModelError } from '../../../src/utils/errors.js';
import { ScriptedTransport } from '../../helpers/fakes.js';

describe('parseVerification', () => {
  it('reads achieved and reason', () => {
    expect(parseVerification('{"achieved": false, "reason": " Calculator is not open "}')).toEqual({
      achieved: false,
      reason: 'Calculator is not open',
    });
  });

  it('accepts true, "yes", "TRUE" and 1 as achieved', () => {
    for (const value of ['true', '"yes"', '"TRUE"', '1']) {
      expect(parseVerification(`{"achieved": ${value}}`)?.achieved).toBe(true);
    }
    for (const value of ['false', '"no"', '0', '2', 'null']) {
      expect(parseVerification(`{"achieved": ${value}}`)?.achieved).toBe(false);
    }
  });

  it('defaults the reason', () => {
    expect(parseVerification('{"achieved": true}')?.reason).toBe('No reason given.');
  });

  it('returns null without an object', () => {
    expect(parseVerification('yes')).toBeNull();
  });
});

describe('Verifier', () => {
  const reply = () => '{"achieved": true, "reason": "It is open"}';

  it('is unknown when disabled, without a transport, or without a snapshot', async () => {
    const transport = new ScriptedTransport(reply);
    expect(await new Verifier({ transport, enabled: false }).verifyStep('t', '/s.png', '')).toBeNull();
    expect(await new Verifier({ transport: null }).verifyStep('t', '/s.png', '')).toBeNull();
    expect(await new Verifier({ transport }).verifyGoal('g', null, '')).toBeNull();
    expect(transport.requests).toHaveLength(0);
  });

  it('asks about the intended action with the after-snapshot', async () => {
    const transport = new ScriptedTransport(reply);
    const result = await new Verifier({ transport }).verifyStep('Open Calculator', '/after.png', 'Linux');
    expect(result).toEqual({ achieved: true, reason: 'It is open' });
    expect(transport.requests[0].user).toContain('Intended action: Open Calculator');
    expect(transport.requests[0].imagePath).toBe('/after.png');
  });

  it('asks about the goal with the final snapshot', async () => {
    const transport = new ScriptedTransport(reply);
    await new Verifier({ transport }).verifyGoal('Compute 3+3', '/final.png', 'Linux');
    expect(transport.requests[0].user).toContain('Goal: Compute 3+3');
  });

  it('is unknown on transport faults and unreadable replies', async () => {
    const failing = new ScriptedTransport(() => new ModelError('exited with code 1'));
    expect(await new Verifier({ transport: failing }).verifyStep('t', '/a.png', '')).toBeNull();
    const rambling = new ScriptedTransport(() => 'Looks fine to me');
    expect(await new Verifier({ transport: rambling }).verifyStep('t', '/a.png', '')).toBeNull();
  });
});
