import { describe, expect, it } from 'vitest';
import { CliTransport } from '../../../src/models/cli-transport.js';

describe('CliTransport', () => {
  it('substitutes {model} and {image} in args', () => {
    const transport = new CliTransport({
      command: 'model-cli',
      args: ['--model', '{model}', '--image={image}', '--json'],
      model: 'vision-small',
      timeout: 30,
    });
    expect(transport.buildArgs('/tmp/a.png')).toEqual(['--model', 'vision-small', '--image=/tmp/a.png', '--json']);
    expect(transport.buildArgs(null)).toEqual(['--model', 'vision-small', '--json']);
    expect(transport.name).toBe('model-cli:vision-small');
  });

  it('puts system and user text on stdin', () => {
    const transport = new CliTransport({ command: 'model-cli', args: ['--image={image}'], timeout: 30 });
    expect(transport.buildPrompt({ system: 'Be brief.', user: 'Goal: x', imagePath: '/tmp/a.png' })).toBe(
      'Be brief.\n\nGoal: x\n',
    );
  });

  it('names the screenshot in the prompt when no arg carries it', () => {
    const transport = new CliTransport({ command: 'model-cli', args: [], timeout: 30 });
    expect(transport.buildPrompt({ system: 'S', user: 'U', imagePath: '/tmp/a.png' })).toBe(
      'S\n\nU\n\nScreenshot: /tmp/a.png\n',
    );
  });
});
