import { describe, it, expect } from 'vitest';
import { createConsoleReporter } from '../src/log/index.js';

describe('createConsoleReporter', () => {
  it('writes one marked line per message', () => {
    const lines: string[] = [];
    const reporter = createConsoleReporter(line => lines.push(line));

    reporter.step('Downloading 1.1');
    reporter.detail('12 B received');
    reporter.success('Manifest saved');
    reporter.warn('TLS verification disabled');

    expect(lines).toHaveLength(4);
    expect(lines[0]).toContain('→');
    expect(lines[0]).toContain('Downloading 1.1');
    expect(lines[1]).toContain('   12 B received');
    expect(lines[2]).toContain('✓');
    expect(lines[2]).toContain('Manifest saved');
    expect(lines[3]).toContain('⚠');
    expect(lines[3]).toContain('TLS verification disabled');
  });
});
