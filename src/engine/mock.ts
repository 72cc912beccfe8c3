import type { ReasoningEngine, ReasoningOutput, ReasoningRequest } from './types.js';

const DEFINITION_PATTERN = /^\s*(?:export\s+)?(?:async\s+)?(?:def|class|function|func|fn)\s+\w+/;
const MARKER_PATTERN = /\b(?:TODO|FIXME|XXX)\b/;
const LONG_LINE = 120;

const splitLines = (content: string) => {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
};

const describeStructure = (request: ReasoningRequest) => {
  const lines = splitLines(request.content);
  const definitions = lines.filter((line) => DEFINITION_PATTERN.test(line)).length;
  const longest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  return [
    `File ${request.fileName}: ${lines.length} line(s).`,
    `Top-level definitions: ${definitions}.`,
    `Longest line: ${longest} character(s).`,
  ].join('\n');
};

const describeDefects = (request: ReasoningRequest) => {
  const findings: string[] = [];
  splitLines(request.content).forEach((line, index) => {
    const lineNo = index + 1;
    if (/[ \t]+$/.test(line)) findings.push(`- line ${lineNo}: trailing whitespace`);
    if (MARKER_PATTERN.test(line)) findings.push(`- line ${lineNo}: unresolved marker`);
    if (line.length > LONG_LINE) findings.push(`- line ${lineNo}: longer than ${LONG_LINE} characters`);
  });
  return findings.length > 0 ? findings.join('\n') : 'No defects flagged.';
};

/** Strips trailing whitespace and ends the file with exactly one newline. */
export const tidySource = (content: string) => {
  const lines = splitLines(content).map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
};

/**
 * Deterministic stand-in for a real reasoning engine: the same request always
 * yields the same output, which keeps local runs and tests reproducible.
 */
export class MockEngine implements ReasoningEngine {
  async invoke(request: ReasoningRequest, _signal?: AbortSignal): Promise<ReasoningOutput> {
    if (request.expectArtifact) {
      const fixed = tidySource(request.content);
      const changed = splitLines(request.content).filter((line) => line !== line.trimEnd()).length;
      return {
        report: changed > 0 ? `Removed trailing whitespace on ${changed} line(s).` : 'No changes required.',
        artifact: { name: request.fileName, content: fixed },
      };
    }

    if (request.priorReports.length === 0) {
      return { report: describeStructure(request) };
    }

    return { report: describeDefects(request) };
  }

  async ping() {
    return true;
  }
}
