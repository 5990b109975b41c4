/**
 * Walk through select, insert, update, delete and RPC against a `todos` table.
 * Expects: todos (id bigint generated, title text, done boolean) and
 * a function count_open_todos() returning integer.
 * Run: npx tsx scripts/query.ts
 */
import 'dotenv/config';
import { SupabaseClient, loadConfigFromEnv, setLogLevel } from '../src/index.js';

async function main() {
    const { config, logLevel } = loadConfigFromEnv();
    setLogLevel(logLevel);
    const client = SupabaseClient.withConfig(config.withoutRealtime());

    console.log('📝 Inserting...');
    const inserted = await client
        .from('todos')
        .insert({ title: 'Try the query example', done: false })
        .select()
        .single();
    if (inserted.error) throw inserted.error;
    const todoId = inserted.data.id;
    console.log(`✅ Inserted #${todoId}`);

    console.log('🔎 Selecting open todos...');
    const open = await client
        .from('todos')
        .select('id, title, done')
        .eq('done', false)
        .order('id', { ascending: false })
        .limit(10);
    if (open.error) throw open.error;
    console.log(JSON.stringify(open.data, null, 2));

    console.log('✏️  Updating...');
    const updated = await client.from('todos').update({ done: true }).eq('id', todoId);
    if (updated.error) throw updated.error;
    console.log(`✅ Updated (HTTP ${updated.status})`);

    console.log('📞 Calling count_open_todos()...');
    const counted = await client.rpc('count_open_todos');
    if (counted.error) throw counted.error;
    console.log(`✅ Open todos: ${JSON.stringify(counted.data)}`);

    console.log('🗑️  Deleting...');
    const deleted = await client.from('todos').delete().eq('id', todoId);
    if (deleted.error) throw deleted.error;
    console.log(`✅ Deleted (HTTP ${deleted.status})`);
}

main().catch((error: unknown) => {
    console.error('❌ Query example failed:', error);
    process.exit(1);
});
