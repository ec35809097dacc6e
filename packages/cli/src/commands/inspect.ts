import { Command } from 'commander';
import pc from 'picocolors';
import { readFileSync, existsSync } from 'node:fs';
import {
  decodeFunctionDetails,
  errorMessage,
  fromDetails,
  parseFunctionDetails,
  WINDOW_FUNCTION_EXECUTOR_CLASS,
} from '@fnconfig/core';
import type { FunctionDetails } from '@fnconfig/core';

// ── Command registration ────────────────────────────────────────────

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .argument('<details-file>', 'Path to a descriptor (function-details.json or function-details.pb)')
    .description('Inspect a runtime descriptor')
    .option('--json', 'Output the descriptor as JSON')
    .option('--config', 'Output the function config it maps back to')
    .action(async (detailsFile: string, opts: { json?: boolean; config?: boolean }) => {
      await runInspect(detailsFile, opts);
    });
}

// ── Inspect logic ───────────────────────────────────────────────────

export async function runInspect(
  detailsFile: string,
  opts: { json?: boolean; config?: boolean },
): Promise<string> {
  if (!existsSync(detailsFile)) {
    console.error(pc.red(`Error: Descriptor file not found: ${detailsFile}`));
    process.exitCode = 1;
    return '';
  }

  const details = loadDetails(detailsFile);

  if (!details) {
    process.exitCode = 1;
    return '';
  }

  let output: string;

  if (opts.config) {
    output = JSON.stringify(fromDetails(details), null, 2);
  } else if (opts.json) {
    output = JSON.stringify(details, null, 2);
  } else {
    output = formatTable(details);
  }

  console.log(output);
  return output;
}

// ── Descriptor loading ──────────────────────────────────────────────

function loadDetails(detailsFile: string): FunctionDetails | null {
  try {
    if (detailsFile.endsWith('.json')) {
      return parseFunctionDetails(JSON.parse(readFileSync(detailsFile, 'utf-8')));
    }

    if (detailsFile.endsWith('.pb')) {
      return decodeFunctionDetails(readFileSync(detailsFile));
    }

    console.error(pc.red(`Unsupported descriptor format: ${detailsFile}`));
    console.error(pc.dim('Supported formats: .json, .pb'));
    return null;
  } catch (err) {
    console.error(pc.red(`Error reading descriptor: ${errorMessage(err)}`));
    return null;
  }
}

// ── Table format ────────────────────────────────────────────────────

function formatTable(details: FunctionDetails): string {
  const lines: string[] = [];
  const fqfn = [details.tenant, details.namespace, details.name].map((p) => p ?? '-').join('/');
  const windowed = details.className === WINDOW_FUNCTION_EXECUTOR_CLASS;

  lines.push('');
  lines.push(`${pc.bold('Function:')}     ${pc.cyan(fqfn)}`);
  lines.push(`${pc.bold('Class:')}        ${details.className ?? '-'}${windowed ? pc.dim(' (windowed)') : ''}`);
  lines.push(`${pc.bold('Runtime:')}      ${details.runtime}`);
  lines.push(`${pc.bold('Guarantee:')}    ${details.processingGuarantees}`);
  lines.push(`${pc.bold('Subscription:')} ${details.source.subscriptionType}`);
  lines.push(`${pc.bold('Parallelism:')}  ${details.parallelism}`);
  lines.push(`${pc.bold('Auto ack:')}     ${details.autoAck ? 'yes' : 'no'}`);
  lines.push('');

  // Inputs table
  lines.push(pc.bold('Inputs'));
  lines.push(pc.dim('─'.repeat(70)));
  lines.push(`  ${pad('Topic', 36)} ${pad('Regex', 6)} ${pad('Schema / SerDe', 24)}`);
  lines.push(pc.dim('─'.repeat(70)));

  for (const [topic, spec] of Object.entries(details.source.inputSpecs)) {
    const codec = spec.schemaType ?? spec.serdeClassName ?? '-';
    lines.push(`  ${pad(topic, 36)} ${pad(spec.isRegexPattern ? 'yes' : 'no', 6)} ${pad(codec, 24)}`);
  }

  lines.push('');

  // Output
  lines.push(pc.bold('Output'));
  lines.push(pc.dim('─'.repeat(40)));
  lines.push(`  ${details.sink.topic ?? pc.dim('(none)')}`);
  const sinkCodec = details.sink.schemaType ?? details.sink.serdeClassName;
  if (sinkCodec) {
    lines.push(`  ${pc.dim(sinkCodec)}`);
  }
  lines.push('');

  if (details.retryDetails) {
    lines.push(pc.bold('Retries'));
    lines.push(pc.dim('─'.repeat(40)));
    lines.push(`  max ${details.retryDetails.maxMessageRetries}`);
    if (details.retryDetails.deadLetterTopic) {
      lines.push(`  dead letter ${pc.dim('→')} ${details.retryDetails.deadLetterTopic}`);
    }
    lines.push('');
  }

  if (details.resources) {
    const { cpu, ram, disk } = details.resources;
    lines.push(pc.bold('Resources'));
    lines.push(pc.dim('─'.repeat(40)));
    lines.push(`  cpu ${cpu ?? '-'}  ram ${ram ?? '-'}  disk ${disk ?? '-'}`);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Utilities ───────────────────────────────────────────────────────

function pad(str: string, width: number): string {
  return str.padEnd(width);
}
