/**
 * Flow catalog — the step sequences for each ticket source.
 *
 * Steps are external scripts run under the configured interpreter from the
 * scripts directory, with the run directory as their working directory.
 * `{name}` placeholders resolve against the validated parameters and the
 * engine variables `interpreter`, `scriptsDir` and `runDir`.
 */

import { FlowDefinition, FlowKind, StepDescriptor, freezeFlow } from '../domain/flow';
import { artifact } from '../engine/artifact-validator';
import { flowEnvironment } from '../environment';
import {
  JITBIT_PARAMETERS,
  JiraParameters,
  JitbitParameters,
  ParameterInfo,
  jiraParameterInfo,
  validateJiraParameters,
  validateJitbitParameters,
} from './parameters';

/** Script locations relative to the scripts directory. */
export const SCRIPTS = {
  jitbitExport: 'ticket_relevante_felder.py',
  jitbitKbExport: 'kb_export_json.py',
  jiraExport: 'jira_relevant_tickets.py',
  llmProcess: 'process_tickets_with_llm.py',
  dedup: 'scripts/dedupe_tickets.py',
  ticketsToDocx: 'tickets_to_docx.py',
  kbToDocx: 'kb_to_docx.py',
} as const;

/** Working files inside a run directory. */
export const FILES = {
  jitbitExport: 'JitBit_relevante_Tickets.json',
  jitbitKbExport: 'JitBit_Knowledgebase.json',
  jitbitLlmOutput: 'Ticket_Data_Jitbit.json',
  jitbitNotRelevant: 'Not_Relevant_Jitbit.json',
  jitbitDocxDir: 'documents/jitbit',
  jitbitKbDocx: 'documents/jitbit/Knowledgebase.docx',
  jiraExport: 'JIRA_relevante_Tickets.json',
  jiraLlmOutput: 'Ticket_Data_Jira.json',
  jiraNotRelevant: 'Not_Relevant_Jira.json',
  jiraDedupOutput: 'tickets_dedup_Jira.json',
  jiraDedupGroups: 'duplicate_groups_Jira.json',
  jiraDedupReview: 'needs_review_Jira.csv',
  jiraDocxDir: 'documents/jira',
} as const;

export const JIRA_JQL = 'project={project} order by resolutiondate DESC';

export interface CatalogOptions {
  jiraProjects: readonly string[];
}

const script = (name: string) => `{scriptsDir}/${name}`;

const program = '{interpreter}';

/** Child processes flush output per line and write UTF-8. */
const SCRIPT_ENV = { PYTHONUNBUFFERED: '1', PYTHONIOENCODING: 'utf-8' };

function jitbitSteps(): StepDescriptor[] {
  return [
    {
      name: 'Export Jitbit Tickets',
      command: {
        program,
        args: [script(SCRIPTS.jitbitExport), '--start-id', '{startId}', '--yes'],
        env: SCRIPT_ENV,
      },
      requiredInputs: [],
      declaredOutputs: [artifact(FILES.jitbitExport)],
      supportsAppend: false,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Export Jitbit Knowledge Base',
      command: {
        program,
        args: [script(SCRIPTS.jitbitKbExport), '--out', FILES.jitbitKbExport, '--yes'],
        env: SCRIPT_ENV,
      },
      requiredInputs: [],
      declaredOutputs: [artifact(FILES.jitbitKbExport)],
      supportsAppend: false,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Process Jitbit Tickets with LLM',
      command: {
        program,
        args: [
          script(SCRIPTS.llmProcess),
          '--input',
          FILES.jitbitExport,
          '--output',
          FILES.jitbitLlmOutput,
          '--not-relevant-out',
          FILES.jitbitNotRelevant,
          { option: '--limit', value: '{llmLimit}' },
          { option: '--max-calls', value: '{llmMaxCalls}' },
          { flag: '--newest-first', when: 'newestFirst' },
          { option: '--save-interval', value: '{llmSaveInterval}' },
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(FILES.jitbitExport)],
      declaredOutputs: [artifact(FILES.jitbitLlmOutput), artifact(FILES.jitbitNotRelevant)],
      supportsAppend: true,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Generate DOCX from Jitbit Tickets',
      command: {
        program,
        args: [
          script(SCRIPTS.ticketsToDocx),
          '--input',
          FILES.jitbitLlmOutput,
          '--output-dir',
          FILES.jitbitDocxDir,
          '--verbose',
          'true',
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(FILES.jitbitLlmOutput)],
      declaredOutputs: [artifact(FILES.jitbitDocxDir, 'directory')],
      supportsAppend: false,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Generate DOCX from Jitbit Knowledge Base',
      command: {
        program,
        args: [script(SCRIPTS.kbToDocx), '--input', FILES.jitbitKbExport, '--output', FILES.jitbitKbDocx],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(FILES.jitbitKbExport)],
      declaredOutputs: [artifact(FILES.jitbitKbDocx, 'file')],
      supportsAppend: false,
      supportsOverwriteFlag: false,
    },
  ];
}

function jiraSteps(params: JiraParameters): StepDescriptor[] {
  const dedupEnabled = !params.skipDeduplication;
  const docxInput = dedupEnabled ? FILES.jiraDedupOutput : FILES.jiraLlmOutput;
  return [
    {
      name: 'Export Jira Tickets',
      command: {
        program,
        args: [
          script(SCRIPTS.jiraExport),
          '--jql',
          JIRA_JQL,
          '--resolved-only',
          '--resolved-after',
          '{resolvedAfter}',
          '--export',
          FILES.jiraExport,
          { option: '--resolved-before', value: '{resolvedBefore}' },
          { option: '--limit', value: '{jiraLimit}' },
          { flag: '--progress', when: 'progress' },
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [],
      declaredOutputs: [artifact(FILES.jiraExport)],
      supportsAppend: true,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Process Jira Tickets with LLM',
      command: {
        program,
        args: [
          script(SCRIPTS.llmProcess),
          '--input',
          FILES.jiraExport,
          '--output',
          FILES.jiraLlmOutput,
          '--not-relevant-out',
          FILES.jiraNotRelevant,
          { option: '--limit', value: '{llmLimit}' },
          { option: '--max-calls', value: '{llmMaxCalls}' },
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(FILES.jiraExport)],
      declaredOutputs: [artifact(FILES.jiraLlmOutput), artifact(FILES.jiraNotRelevant)],
      supportsAppend: true,
      supportsOverwriteFlag: false,
    },
    {
      name: 'Deduplicate Jira Tickets',
      command: {
        program,
        args: [
          script(SCRIPTS.dedup),
          '--input',
          FILES.jiraLlmOutput,
          '--out',
          FILES.jiraDedupOutput,
          '--groups-out',
          FILES.jiraDedupGroups,
          '--review-out',
          FILES.jiraDedupReview,
          '--threshold',
          '{dedupThreshold}',
          '--threshold-low',
          '{dedupThresholdLow}',
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(FILES.jiraLlmOutput)],
      declaredOutputs: [
        artifact(FILES.jiraDedupOutput),
        artifact(FILES.jiraDedupGroups),
        artifact(FILES.jiraDedupReview),
      ],
      supportsAppend: false,
      supportsOverwriteFlag: false,
      enabled: dedupEnabled,
    },
    {
      name: 'Generate DOCX from Jira Tickets',
      command: {
        program,
        args: [
          script(SCRIPTS.ticketsToDocx),
          '--input',
          docxInput,
          '--output-dir',
          FILES.jiraDocxDir,
          '--verbose',
          'true',
        ],
        env: SCRIPT_ENV,
      },
      requiredInputs: [artifact(docxInput)],
      declaredOutputs: [artifact(FILES.jiraDocxDir, 'directory')],
      supportsAppend: false,
      supportsOverwriteFlag: false,
    },
  ];
}

function toParameterRecord(params: JitbitParameters | JiraParameters): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) record[key] = value;
  }
  return record;
}

/**
 * Validate raw parameters and build the frozen flow definition for a kind.
 * Throws VALIDATION.PARAMETERS on bad input.
 */
export function buildFlowDefinition(kind: FlowKind, raw: unknown, options: CatalogOptions): FlowDefinition {
  if (kind === 'jitbit') {
    const params = validateJitbitParameters(raw);
    return freezeFlow({
      kind,
      steps: jitbitSteps(),
      parameters: toParameterRecord(params),
      environment: flowEnvironment(kind),
    });
  }
  const params = validateJiraParameters(raw, options.jiraProjects);
  return freezeFlow({
    kind,
    steps: jiraSteps(params),
    parameters: toParameterRecord(params),
    environment: flowEnvironment(kind),
  });
}

export interface FlowSummary {
  kind: FlowKind;
  steps: string[];
  parameters: ParameterInfo[];
  environment: string[];
}

/** Static description of every flow kind, for listings. */
export function listFlows(options: CatalogOptions): FlowSummary[] {
  return [
    {
      kind: 'jitbit',
      steps: jitbitSteps().map((s) => s.name),
      parameters: [...JITBIT_PARAMETERS],
      environment: flowEnvironment('jitbit').map((r) => r.keys.join(' | ')),
    },
    {
      kind: 'jira',
      steps: jiraSteps({
        project: options.jiraProjects[0] ?? '',
        resolvedAfter: '',
        dedupThreshold: 0,
        dedupThresholdLow: 0,
        progress: false,
        skipDeduplication: false,
      }).map((s) => s.name),
      parameters: jiraParameterInfo(options.jiraProjects),
      environment: flowEnvironment('jira').map((r) => r.keys.join(' | ')),
    },
  ];
}
