import { formatActivation } from './activation.js';
import type { AnalyzedProgram, AnalyzedStream, Offset, Pacing, StreamId } from './ir.js';
import { formatStreamType } from './types.js';
import { formatFrequency } from './units.js';

type DotNode = {
  id: string;
  label: string;
  shape: string;
};

type DotEdge = {
  from: string;
  to: string;
  label: string;
  style?: string;
};

function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatOffset(offset: Offset): string {
  switch (offset.kind) {
    case 'current':
      return 'now';
    case 'lookback':
      return `-${offset.steps}`;
    case 'lookahead':
      return `+${offset.steps}`;
    case 'hold':
      return 'hold';
    case 'window':
      return `${offset.op} ${offset.duration.toString()}`;
  }
}

export function formatPacing(pacing: Pacing, nameOf: (id: StreamId) => string): string {
  return pacing.kind === 'periodic' ? `@ ${formatFrequency(pacing.frequency)}` : `@ ${formatActivation(pacing.activation, nameOf)}`;
}

const shapes: Record<AnalyzedStream['kind'], string> = {
  input: 'box',
  output: 'ellipse',
  trigger: 'octagon',
};

/**
 * Graphviz rendering of an analyzed program. Edges point from the stream
 * read to its reader; edges that read the past are dashed.
 */
export function streamGraphToDot(program: AnalyzedProgram): string {
  const names = new Map(program.streams.map(stream => [stream.id, stream.name]));
  const nameOf = (id: StreamId): string => names.get(id) ?? `#${id}`;

  const nodes: DotNode[] = program.streams.map(stream => ({
    id: `s${stream.id}`,
    label: `${stream.name}: ${formatStreamType(stream.type)}\n${formatPacing(stream.pacing, nameOf)}`,
    shape: shapes[stream.kind],
  }));

  const edges: DotEdge[] = program.references.map(ref => ({
    from: `s${ref.source}`,
    to: `s${ref.target}`,
    label: formatOffset(ref.offset),
    style: ref.offset.kind === 'lookback' || ref.offset.kind === 'window' ? 'dashed' : undefined,
  }));

  const lines: string[] = [];
  lines.push('digraph CadenceStreams {');
  lines.push('  rankdir=LR;');
  for (const node of nodes) {
    lines.push(`  ${node.id} [shape=${node.shape}, label="${escapeLabel(node.label)}"];`);
  }
  for (const edge of edges) {
    const style = edge.style ? `, style=${edge.style}` : '';
    lines.push(`  ${edge.from} -> ${edge.to} [label="${escapeLabel(edge.label)}"${style}];`);
  }
  lines.push('}');
  return lines.join('\n');
}
