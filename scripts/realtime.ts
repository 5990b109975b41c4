/**
 * Broadcast and presence on a Realtime channel.
 * Run: npm run example:realtime
 */
import 'dotenv/config';
import { REALTIME_SUBSCRIBE_STATES } from '@supabase/realtime-js';
import { SupabaseClient, loadConfigFromEnv, setLogLevel } from '../src/index.js';

const LISTEN_MS = 10_000;

async function main() {
    const { config, logLevel } = loadConfigFromEnv();
    setLogLevel(logLevel);

    const client = SupabaseClient.withConfig(config);
    const realtime = client.realtime();

    console.log(`🔌 Connecting to ${client.realtimeUrl()}...`);
    realtime.connect();

    const channel = realtime.channel('room:lobby', {
        config: { broadcast: { self: true }, presence: { key: 'node-client' } },
    });

    let received = 0;
    channel.on('broadcast', { event: 'message' }, (message) => {
        received++;
        console.log(`📨 Message #${received}:`, JSON.stringify(message.payload));
    });
    channel.on('presence', { event: 'sync' }, () => {
        console.log('👥 Present:', JSON.stringify(channel.presenceState(), null, 2));
    });

    await new Promise<void>((resolve, reject) => {
        channel.subscribe((status, err) => {
            if (status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED) {
                resolve();
            } else if (status === REALTIME_SUBSCRIBE_STATES.CHANNEL_ERROR || status === REALTIME_SUBSCRIBE_STATES.TIMED_OUT) {
                reject(err ?? new Error(`subscribe failed: ${status}`));
            }
        });
    });
    console.log('✅ Subscribed to room:lobby');

    await channel.send({
        type: 'broadcast',
        event: 'message',
        payload: { text: 'Hello from Node!', timestamp: new Date().toISOString() },
    });
    console.log('✅ Message sent');

    await channel.track({ user: 'node-client', status: 'online', joined_at: new Date().toISOString() });
    console.log('✅ Presence tracked');

    console.log(`\n👂 Listening for ${LISTEN_MS / 1000}s (open another client on room:lobby to see messages)...`);
    await new Promise(resolve => setTimeout(resolve, LISTEN_MS));

    console.log(`\n⏰ Done after ${received} messages`);
    await realtime.removeAllChannels();
}

main().catch((error: unknown) => {
    console.error('❌ Realtime example failed:', error);
    process.exit(1);
});
