#!/usr/bin/env node
import chalk from 'chalk';
import { config } from './config';
import { AgentCore } from './agent/core';
import { SessionManager } from './agent/session';
import { GatewayServer } from './gateway/server';
import { ArcGisGeocoder } from './geocode/arcgis';
import { OpenAIModelClient } from './nlp/engine';
import { defaultGazetteer } from './nlp/gazetteer';
import { createMapTools } from './tools/map';
import { ToolRegistry } from './tools/registry';

async function main(): Promise<void> {
    // ── Banner ──
    console.log(chalk.bold.cyan('\n╔═════════════════════════════════════════════════════════╗'));
    console.log(chalk.bold.cyan('║') + chalk.bold.magenta('   🗺️  Map Navigator') + chalk.gray('  chat-driven map control') + '              ' + chalk.bold.cyan('║'));
    console.log(chalk.bold.cyan('╚═════════════════════════════════════════════════════════╝'));
    console.log(chalk.gray(`   LLM Provider: ${config.llm.provider}`));
    console.log(chalk.gray(`   Endpoint:     ${config.llm.baseUrl}`));
    console.log(chalk.gray(`   Model:        ${config.llm.model}\n`));

    // ── Validate Configuration ──
    console.log(chalk.bold.yellow('⚙️  Validating Configuration...'));
    if (!config.llm.baseUrl || !config.llm.model) {
        console.log(chalk.bold.red('   ✖ LLM_BASE_URL and LLM_MODEL are required'));
        console.log(chalk.gray('   → Set them in .env file\n'));
        process.exit(1);
    }
    const gazetteer = defaultGazetteer();
    console.log(chalk.green(`   ✓ Configuration valid (${gazetteer.size} gazetteer places)\n`));

    // ── Components ──
    const geocoder = new ArcGisGeocoder({
        url: config.geocoder.url,
        maxLocations: config.geocoder.maxLocations,
    });

    const registry = new ToolRegistry();
    createMapTools({ geocoder, geocodeZoom: config.geocoder.resultZoom }).forEach((tool) => registry.register(tool));
    console.log(chalk.gray('   ▸ Tools: ') + chalk.white(registry.getNames().join(', ')));

    const model = new OpenAIModelClient({
        baseUrl: config.llm.baseUrl,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
    });

    const agent = new AgentCore(model, registry, {
        maxIterations: config.agent.maxIterations,
        stopOnRepeatedToolCalls: config.agent.stopOnRepeatedToolCalls,
    });
    console.log(chalk.gray('   ▸ Agent: ') + chalk.white(`max ${config.agent.maxIterations} tool round(s) per message`));

    const sessions = new SessionManager({
        agent,
        registry,
        initialMap: { center: config.map.defaultCenter, zoom: config.map.defaultZoom },
    });

    // ── Gateway ──
    const gateway = new GatewayServer(sessions, {
        host: config.server.host,
        port: config.server.port,
        corsOrigin: config.server.corsOrigin,
        model: config.llm.model,
    });
    await gateway.start();

    console.log(chalk.bold.green('\n   ✓ MAP NAVIGATOR IS RUNNING'));
    console.log(chalk.gray('   Press Ctrl+C to stop\n'));

    // ── Graceful Shutdown ──
    const shutdown = async () => {
        console.log(chalk.yellow('\n━━━ SHUTTING DOWN ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
        try {
            await gateway.stop();
            console.log(chalk.green('   ✓ Shutdown complete\n'));
            process.exit(0);
        } catch (error) {
            console.log(chalk.bold.red('   ✖ Shutdown failed:'), error instanceof Error ? error.message : error);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
}

main().catch((err: unknown) => {
    console.log(chalk.bold.red('\n✖ Startup Failed:'), err instanceof Error ? err.message : err);
    if (err instanceof Error && err.stack) {
        console.log(chalk.gray(err.stack));
    }
    process.exit(1);
});
