import { Command } from 'commander';
import { parseVersion, type Segment } from 'segver-core';
import { runCommand } from '../utils/command.js';
import { outputJSON, outputKeyValue, outputTable } from '../utils/formatter.js';

interface SegmentRow {
  index: number;
  kind: Segment['kind'];
  text: string;
  value?: string;
}

function describeSegment(segment: Segment, index: number): SegmentRow {
  if (segment.kind === 'numeric') {
    return { index, kind: segment.kind, text: segment.text, value: segment.value.toString() };
  }
  return { index, kind: segment.kind, text: segment.text };
}

/**
 * Register `segver tokens <version>`, which shows how a version is split and classified.
 */
export function registerTokenCommands(program: Command): void {
  program
    .command('tokens <version>')
    .description('Show the segments a version is compared by')
    .action((version: string) => {
      runCommand(program, 'tokens', ({ logger, json }) => {
        const segments = parseVersion(version).map(describeSegment);
        logger.debug('Parsed version', { version, count: segments.length });

        if (json) {
          outputJSON({ version, segments });
          return;
        }

        outputKeyValue('Version', version);
        outputTable(
          ['#', 'Kind', 'Text', 'Value'],
          segments.map((s) => [String(s.index), s.kind, s.text, s.value ?? ''])
        );
      });
    });
}
