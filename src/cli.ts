#!/usr/bin/env node
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createRagService } from './services/RagServiceFactory.js';
import type { IndexHandle } from './services/RagService.js';

interface CliArgs {
  file?: string;
  load?: string;
  save?: string;
  question?: string;
  k?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  format?: 'text' | 'json';
  help?: boolean;
}

const HELP = `
Fragment Retrieval - Index a document and answer a question from it

Usage:
  npm run ask -- --file <path> --question <text> [options]
  npm run ask -- --load <snapshot.json> --question <text> [options]

Options:
  --file <path>           Document to index (.pdf, .csv, .xlsx, .xls, text)
  --load <path>           Load a saved index snapshot instead of a document
  --save <path>           Save the index snapshot after ingestion
  --question <text>       Question to answer
  --k <n>                 Fragments to retrieve (default: RETRIEVAL_K)
  --chunk-size <n>        Fragment size (default: CHUNK_SIZE)
  --chunk-overlap <n>     Fragment overlap (default: CHUNK_OVERLAP)
  --format <fmt>          Output format: text or json (default: text)
  --help                  Show this help message

Examples:
  npm run ask -- --file ./handbook.pdf --question "Who approves leave?"
  npm run ask -- --file ./staff.csv --save ./data/staff.json --question "Who works at Acme?"
  npm run ask -- --load ./data/staff.json --question "Who works at Acme?" --format json
`;

const parseArgs = (): CliArgs => {
  const args: CliArgs = {};
  const argv = process.argv.slice(2);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--file':
        args.file = argv[++i];
        break;
      case '--load':
        args.load = argv[++i];
        break;
      case '--save':
        args.save = argv[++i];
        break;
      case '--question':
        args.question = argv[++i];
        break;
      case '--k':
        args.k = parseInt(argv[++i], 10);
        break;
      case '--chunk-size':
        args.chunkSize = parseInt(argv[++i], 10);
        break;
      case '--chunk-overlap':
        args.chunkOverlap = parseInt(argv[++i], 10);
        break;
      case '--format':
        args.format = argv[++i] === 'json' ? 'json' : 'text';
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

const printHandle = (handle: IndexHandle) => {
  console.log(`Index:     ${handle.id} (${handle.status})`);
  console.log(`Source:    ${handle.source}`);
  console.log(`Fragments: ${handle.completed}/${handle.requested}`);
  if (handle.error) {
    console.log(`Error:     ${handle.error.message}`);
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs();

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  const { question } = args;
  if (!question) {
    console.error('Error: --question is required');
    console.log(HELP);
    process.exit(1);
  }

  const rag = createRagService(config);

  let handle: IndexHandle;
  if (args.load) {
    handle = await rag.load(args.load);
  } else if (args.file) {
    handle = await rag.ingest(
      { filePath: args.file },
      { chunkSize: args.chunkSize, chunkOverlap: args.chunkOverlap }
    );
  } else {
    console.error('Error: one of --file or --load is required');
    console.log(HELP);
    process.exit(1);
  }

  if (args.save) {
    await rag.save(handle.id, args.save);
  }

  const result = await rag.answer(handle.id, question, { k: args.k });

  if (args.format === 'json') {
    console.log(
      JSON.stringify(
        {
          index: { id: handle.id, status: handle.status, completed: handle.completed, requested: handle.requested },
          answer: result.answer,
          sources: result.fragments.map(({ fragment, distance }) => ({
            text: fragment.text,
            sourceMetadata: fragment.sourceMetadata,
            distance,
          })),
        },
        null,
        2
      )
    );
    return;
  }

  printHandle(handle);
  console.log('\nSources:');
  for (const { fragment, distance } of result.fragments) {
    const origin = Object.entries(fragment.sourceMetadata)
      .map(([key, value]) => `${key}=${value}`)
      .join(', ');
    console.log(`  [${distance.toFixed(4)}] ${origin}`);
  }
  console.log(`\nAnswer:\n${result.answer}`);
};

main().catch(error => {
  logger.error({ error }, 'Command failed');
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
