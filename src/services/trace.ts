/**
 * Thought Trace - per-turn record and its text renderings
 * @module services/trace
 */

import type {
  ActivationMap,
  ContributingEdge,
  GoalCandidate,
  Modulators,
  StepRecord,
  TextMatch,
  WordCandidate,
} from '../types/index.js';

export const TRACE_CANDIDATE_LIMIT = 15;

export interface Trace {
  inputMapping: TextMatch[];
  initialActivations: ActivationMap;
  modulators: Modulators;
  steps: StepRecord[];
  topEdges: ContributingEdge[];
  memoryEffects: ActivationMap;
  selectedGoal: string;
  goalCandidates: GoalCandidate[];
  languageCandidates: WordCandidate[];
  languageSelected: WordCandidate[];
  finalWords: string[];
  snapshotDigest: string;
}

export function createTrace(): Trace {
  return {
    inputMapping: [],
    initialActivations: {},
    modulators: {},
    steps: [],
    topEdges: [],
    memoryEffects: {},
    selectedGoal: '',
    goalCandidates: [],
    languageCandidates: [],
    languageSelected: [],
    finalWords: [],
    snapshotDigest: '',
  };
}

const byValueDesc = ([, a]: [string, number], [, b]: [string, number]) => b - a;

function conceptList(ids: string[]): string {
  return `[${ids.join(', ')}]`;
}

/**
 * First, middle and last step, when that many exist
 */
function sampleSteps(steps: StepRecord[]): StepRecord[] {
  const n = steps.length;
  const picked: StepRecord[] = [];
  if (n >= 1) picked.push(steps[0]);
  if (n >= 3) picked.push(steps[Math.floor(n / 2)]);
  if (n >= 2) picked.push(steps[n - 1]);
  return picked;
}

export function formatCompact(trace: Trace): string {
  const lines: string[] = ['─── THOUGHT TRACE ───'];

  if (trace.inputMapping.length > 0) {
    lines.push('  Input → Concepts:');
    for (const m of trace.inputMapping) {
      lines.push(`    '${m.text}' → ${conceptList(m.conceptIds)}`);
    }
  }

  const initial = Object.entries(trace.initialActivations).sort(byValueDesc).slice(0, 5);
  if (initial.length > 0) {
    lines.push('  Initial Activations:');
    for (const [id, value] of initial) {
      lines.push(`    ${id}: ${value.toFixed(3)}`);
    }
  }

  const mods = Object.entries(trace.modulators);
  if (mods.length > 0) {
    lines.push(`  Modulators: ${mods.map(([k, v]) => `${k}=${v.toFixed(2)}`).join(', ')}`);
  }

  if (trace.steps.length > 0) {
    lines.push('  Dynamics (selected steps):');
    for (const record of sampleSteps(trace.steps)) {
      const top = record.topFiring.slice(0, 4).map(f => `${f.id}=${f.activation.toFixed(2)}`).join(', ');
      lines.push(`    Step ${record.step}: [${top}]`);
    }
  }

  if (trace.topEdges.length > 0) {
    lines.push('  Top Routes (edges):');
    for (const e of trace.topEdges.slice(0, 5)) {
      lines.push(`    ${e.sourceId} →(${e.type})→ ${e.targetId}  contrib=${e.contribution.toFixed(3)}`);
    }
  }

  const memory = Object.entries(trace.memoryEffects);
  if (memory.length > 0) {
    lines.push('  Memory Boost:');
    for (const [id, boost] of memory) {
      lines.push(`    ${id}: +${boost.toFixed(3)}`);
    }
  }

  if (trace.selectedGoal) {
    lines.push(`  Goal: ${trace.selectedGoal}`);
    if (trace.goalCandidates.length > 0) {
      const cands = trace.goalCandidates.slice(0, 4).map(g => `${g.id}=${g.activation.toFixed(2)}`).join(', ');
      lines.push(`    Candidates: [${cands}]`);
    }
  }

  if (trace.languageSelected.length > 0) {
    lines.push('  Word Selection:');
    for (const w of trace.languageSelected.slice(0, 8)) {
      lines.push(`    '${w.word}' score=${w.score.toFixed(3)} (${w.reason})`);
    }
  }

  if (trace.finalWords.length > 0) {
    lines.push(`  Output: ${trace.finalWords.join(' ')}`);
  }

  lines.push('─────────────────────');
  return lines.join('\n');
}

export function formatFull(trace: Trace): string {
  const lines: string[] = ['═══ FULL THOUGHT TRACE ═══'];

  lines.push('', '[INPUT MAPPING]');
  for (const m of trace.inputMapping) {
    lines.push(`  '${m.text}' → ${conceptList(m.conceptIds)}`);
  }

  lines.push('', '[INITIAL ACTIVATIONS]');
  for (const [id, value] of Object.entries(trace.initialActivations).sort(byValueDesc)) {
    if (value > 0) {
      lines.push(`  ${id}: ${value.toFixed(4)}`);
    }
  }

  lines.push('', '[MODULATORS]');
  for (const [k, v] of Object.entries(trace.modulators)) {
    lines.push(`  ${k}: ${v.toFixed(3)}`);
  }

  lines.push('', '[DYNAMICS STEPS]');
  for (const record of trace.steps) {
    const top = record.topFiring.slice(0, 6).map(f => `${f.id}=${f.activation.toFixed(3)}`).join(', ');
    lines.push(`  Step ${String(record.step).padStart(2)}: [${top}]`);
  }

  lines.push('', '[TOP CONTRIBUTING EDGES]');
  for (const e of trace.topEdges) {
    lines.push(`  ${e.sourceId} →(${e.type})→ ${e.targetId}  contribution=${e.contribution.toFixed(4)}`);
  }

  lines.push('', '[MEMORY EFFECTS]');
  const memory = Object.entries(trace.memoryEffects);
  if (memory.length === 0) {
    lines.push('  (none)');
  }
  for (const [id, boost] of memory) {
    lines.push(`  ${id}: +${boost.toFixed(4)}`);
  }

  lines.push('', '[GOAL SELECTION]');
  lines.push(`  Selected: ${trace.selectedGoal}`);
  for (const g of trace.goalCandidates) {
    const marker = g.id === trace.selectedGoal ? ' ◄' : '';
    lines.push(`    ${g.id}: ${g.activation.toFixed(4)}${marker}`);
  }

  lines.push('', '[LANGUAGE CANDIDATES]');
  for (const w of trace.languageCandidates.slice(0, TRACE_CANDIDATE_LIMIT)) {
    lines.push(`  '${w.word}' pos=${w.pos} score=${w.score.toFixed(3)} | ${w.reason}`);
  }

  lines.push('', '[SELECTED WORDS]');
  trace.languageSelected.forEach((w, i) => {
    lines.push(`  ${i + 1}. '${w.word}' pos=${w.pos} score=${w.score.toFixed(3)}`);
  });

  lines.push('', `[OUTPUT] ${trace.finalWords.join(' ')}`);
  if (trace.snapshotDigest) {
    lines.push(`[SNAPSHOT] ${trace.snapshotDigest}`);
  }
  lines.push('══════════════════════════');
  return lines.join('\n');
}
