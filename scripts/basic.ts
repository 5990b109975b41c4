/**
 * Build a client from .env and run one query.
 * Run: npx tsx scripts/basic.ts
 */
import 'dotenv/config';
import { SupabaseClient, loadConfigFromEnv, setLogLevel } from '../src/index.js';

async function main() {
    const { config, logLevel } = loadConfigFromEnv();
    setLogLevel(logLevel);

    const client = SupabaseClient.withConfig(config);
    console.log(`✅ ${client.toString()}`);
    console.log(`   REST:     ${config.restUrl()}`);
    console.log(`   Realtime: ${client.realtimeUrl()}`);

    const table = process.argv[2] ?? 'users';
    const { data, error, status } = await client.from(table).select('*').limit(5);
    if (error) {
        console.error(`❌ ${table}: ${error.message} (HTTP ${status})`);
        process.exit(1);
    }

    console.log(`\n📦 First rows of ${table}:`);
    console.log(JSON.stringify(data, null, 2));
}

main().catch((error: unknown) => {
    console.error('❌ Fatal:', error);
    process.exit(1);
});
