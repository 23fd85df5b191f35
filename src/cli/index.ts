#!/usr/bin/env node
import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig, type GroundworkConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { GroundworkEngine } from '../builder/engine.js';
import { GraphDatabase } from '../storage/database.js';
import type { GroundworkConfig } from '../types/index.js';
import { loadManifest } from './manifest.js';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('groundwork')
    .description('Knowledge-graph ingestion and hybrid retrieval with grounded, self-correcting answers.')
    .version(VERSION);

const commonOptions = z.object({
    db: z.string().optional(),
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
    provider: z.enum(['local', 'openai', 'ollama']).optional(),
});

type CommonOptions = z.infer<typeof commonOptions>;

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .option('--provider <kind>', 'Collaborator provider: local | openai | ollama')
        .option('--log-level <level>', 'Log level: silent | error | warn | info | debug')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve the configuration, open the database and load the engine state.
 * The state is written back when `persist` is set and the action succeeds.
 */
async function runWithEngine(
    opts: CommonOptions,
    overrides: GroundworkConfigOverrides,
    persist: boolean,
    action: (engine: GroundworkEngine, config: GroundworkConfig) => Promise<void>
): Promise<void> {
    const config = await resolveConfig({
        ...overrides,
        ...(opts.db ? { db: opts.db } : {}),
        ...(opts.logLevel ? { logLevel: opts.logLevel } : {}),
        ...(opts.jsonLogs ? { jsonLogs: true } : {}),
        ...(opts.provider ? { provider: { kind: opts.provider } } : {}),
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const logger = getLogger();

    const db = new GraphDatabase(config.db);
    try {
        const engine = new GroundworkEngine({ config });
        engine.load(db);
        await action(engine, config);
        if (persist) engine.save(db);
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Command failed');
        process.exitCode = 1;
    } finally {
        db.close();
    }
}

// ─── INGEST command ───────────────────────────────────────

withCommonOptions(
    program
        .command('ingest')
        .description('Ingest the documents listed in a JSON manifest')
        .requiredOption('-m, --manifest <path>', 'Manifest file ({ "documents": [...] })')
        .option('-c, --concurrency <n>', 'Documents processed at once')
).action(async (raw: unknown) => {
    const opts = commonOptions
        .extend({ manifest: z.string(), concurrency: z.coerce.number().int().positive().optional() })
        .parse(raw);

    await runWithEngine(
        opts,
        opts.concurrency ? { ingest: { concurrency: opts.concurrency } } : {},
        true,
        async (engine) => {
            const report = await engine.ingest(loadManifest(opts.manifest));

            console.log('\nIngestion report\n');
            for (const doc of report.documents) {
                const version = doc.version === undefined ? '' : ` v${doc.version}`;
                const detail = doc.error ? ` (${doc.error})` : ` ${doc.sections} sections, ${doc.entities} entities, ${doc.relationships} relationships`;
                console.log(`  ${doc.status.padEnd(8)} ${doc.documentId}${version}${detail}`);
            }
            console.log('');
            console.log(`  Entities created:     ${report.entitiesCreated}`);
            console.log(`  Merges:               ${report.merges.length}`);
            console.log(`  Flagged for review:   ${report.flagged.length}`);
            console.log(`  Unresolved:           ${report.unresolved.length}`);
            console.log(`  Dangling edges:       ${report.danglingEdges.length}`);
            console.log(`  Extraction failures:  ${report.extractionFailures.length}`);
            console.log(`  Rejected trees:       ${report.treeErrors.length}`);
            console.log(`  Duration:             ${report.durationMs}ms\n`);
        }
    );
});

// ─── COMMUNITIES command ──────────────────────────────────

withCommonOptions(
    program.command('communities').description('Detect entity communities and publish a new mapping version')
).action(async (raw: unknown) => {
    const opts = commonOptions.parse(raw);

    await runWithEngine(opts, {}, true, async (engine) => {
        const published = engine.detectCommunities();

        console.log(`\nCommunity mapping v${published.version} (modularity ${published.modularity.toFixed(3)})\n`);
        for (const community of published.communities) {
            console.log(`  #${community.id} ${community.label} (${community.members.length} members)`);
            if (community.keyEntities.length > 0) {
                console.log(`      key: ${community.keyEntities.join(', ')}`);
            }
        }
        console.log('');
    });
});

// ─── QUERY command ────────────────────────────────────────

withCommonOptions(
    program
        .command('query')
        .description('Answer a query with cited, verified sources')
        .argument('<text>', 'Query text')
        .option('-d, --domain <domains...>', 'Restrict retrieval to these domains')
        .option('-k, --top-k <n>', 'Maximum fused results')
        .option('--retrieve-only', 'Print the fused results without generating an answer')
).action(async (text: string, raw: unknown) => {
    const opts = commonOptions
        .extend({
            domain: z.array(z.string()).optional(),
            topK: z.coerce.number().int().positive().optional(),
            retrieveOnly: z.boolean().optional(),
        })
        .parse(raw);

    await runWithEngine(opts, opts.topK ? { retrieval: { topK: opts.topK } } : {}, false, async (engine) => {
        if (opts.retrieveOnly) {
            const response = await engine.retrieve(text, { domains: opts.domain ?? null });
            console.log('');
            for (const [rank, result] of response.results.entries()) {
                console.log(
                    `  ${rank + 1}. ${result.section.id} ${result.fusedScore.toFixed(3)} [${result.strategies.join(', ')}] ${result.section.title}`
                );
            }
            for (const degraded of response.degraded) {
                console.log(`  degraded: ${degraded.strategy} (${degraded.reason})`);
            }
            console.log('');
            return;
        }

        const outcome = await engine.answer(text, { domains: opts.domain ?? null });
        console.log(`\n${outcome.response}\n`);
        console.log(`  State:      ${outcome.state}${outcome.verified ? '' : ' (unverified)'}`);
        console.log(`  Iterations: ${outcome.iterations}`);
        console.log(`  Citations:  ${outcome.citations.map((citation) => citation.marker).join(' ') || '(none)'}`);
        if (outcome.degraded.length > 0) {
            console.log(`  Degraded:   ${outcome.degraded.map((d) => `${d.strategy} (${d.reason})`).join(', ')}`);
        }
        console.log('');
    });
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect').description('Show graph, index and community statistics')).action(
    async (raw: unknown) => {
        const opts = commonOptions.parse(raw);

        await runWithEngine(opts, {}, false, async (engine) => {
            const inspection = engine.inspect();

            console.log('\nGroundwork Statistics\n');
            console.log(`  Documents:     ${inspection.graph.documents}`);
            console.log(`  Sections:      ${inspection.graph.sections}`);
            console.log(`  Entities:      ${inspection.graph.entities}`);
            console.log(`  Relationships: ${inspection.graph.relationships}`);
            console.log(`  Merged ids:    ${inspection.graph.redirects}`);
            console.log(`  Trees:         ${inspection.trees}`);
            console.log(`  Dangling:      ${inspection.integrity.dangling.length} of ${inspection.integrity.checked}`);

            if (inspection.communities) {
                console.log(
                    `  Communities:   ${inspection.communities.count} (v${inspection.communities.version}, modularity ${inspection.communities.modularity.toFixed(3)})`
                );
            }

            if (Object.keys(inspection.graph.entitiesByType).length > 0) {
                console.log('\n  Entity Types:');
                for (const [type, count] of Object.entries(inspection.graph.entitiesByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }

            if (inspection.potentialDuplicates.length > 0) {
                console.log('\n  Potential duplicates:');
                for (const dup of inspection.potentialDuplicates.slice(0, 10)) {
                    console.log(`    ${dup.a} ~ ${dup.b} (${dup.similarity.toFixed(2)})`);
                }
            }

            if (inspection.crossDomainEntities.length > 0) {
                console.log('\n  Cross-domain entities:');
                for (const entry of inspection.crossDomainEntities.slice(0, 10)) {
                    console.log(`    ${entry.entityId}: ${entry.domains.join(', ')}`);
                }
            }

            console.log('');
        });
    }
);

program.parseAsync().catch((error: unknown) => {
    console.error('groundwork:', errorMessage(error));
    process.exitCode = 1;
});
