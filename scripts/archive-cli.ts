#!/usr/bin/env tsx
/**
 * CLI for listing guilds and channels and triggering archive runs
 */

import 'dotenv/config';
import axios from 'axios';
import { config } from '../src/config/env.js';
import type {
  ArchiveRun,
  GuildChannels,
} from '../src/services/archive/index.js';
import type { Guild } from '../src/types/archive.js';
import { getErrorMessage } from '../src/types/errors.js';

const API_BASE_URL =
  process.env.API_BASE_URL || `http://localhost:${config.PORT}`;

const api = axios.create({
  baseURL: `${API_BASE_URL}/api`,
  headers: { 'X-API-KEY': config.ADMIN_API_KEY },
});

function fail(action: string, error: unknown): never {
  const detail = axios.isAxiosError(error)
    ? JSON.stringify(error.response?.data ?? error.message)
    : getErrorMessage(error);
  console.error(`❌ Failed to ${action}: ${detail}`);
  process.exit(1);
}

async function listGuilds() {
  try {
    const response = await api.get<{ guilds: Guild[] }>('/guilds');
    for (const guild of response.data.guilds) {
      console.log(`${guild.id}\t${guild.name}`);
    }
  } catch (error) {
    fail('list guilds', error);
  }
}

async function listChannels(guildId: string) {
  try {
    const response = await api.get<GuildChannels>(`/guilds/${guildId}/channels`);
    console.log(`📁 ${response.data.guild.name}`);
    for (const channel of response.data.channels) {
      const mark = channel.archived ? '✅' : '  ';
      console.log(`${mark} ${channel.id}\t${channel.category} / #${channel.name}`);
    }
  } catch (error) {
    fail('list channels', error);
  }
}

async function startArchive(guildId: string, channelIds: string[]) {
  try {
    console.log(`🚀 Archiving ${channelIds.length} channel(s)...`);
    const response = await api.post<{ runId: string; message: string }>(
      '/archives',
      { guildId, channelIds }
    );
    console.log('✅ Run started:', response.data.message);
    console.log(`   Run ID: ${response.data.runId}`);
    return response.data.runId;
  } catch (error) {
    fail('start archive', error);
  }
}

async function checkStatus(runId: string) {
  try {
    const response = await api.get<ArchiveRun>(`/archives/${runId}`);
    const run = response.data;

    console.log(`📊 Run ${run.id}: ${run.status} (${run.guild.name})`);
    for (const entry of run.channels) {
      const outcome = entry.outcome ? ` → ${entry.outcome}` : '';
      const message = entry.result ? ` (${entry.result.message})` : '';
      console.log(`   #${entry.channel.name}: ${entry.progress}${outcome}${message}`);
    }
    return run;
  } catch (error) {
    fail('check status', error);
  }
}

async function waitForCompletion(runId: string, checkInterval = 2000) {
  console.log(`⏳ Waiting for run ${runId} to complete...`);

  for (;;) {
    const run = await checkStatus(runId);
    if (run.status === 'completed') {
      const errors = run.channels.filter((entry) => entry.outcome === 'error');
      if (errors.length > 0) {
        console.error(`⚠️  ${errors.length} channel(s) failed`);
        process.exit(1);
      }
      console.log('✅ Archive run completed');
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, checkInterval));
  }
}

function printUsage() {
  console.log('📦 Discord Archiver CLI');
  console.log('');
  console.log('Commands:');
  console.log('  npm run archive guilds                                  List guilds');
  console.log('  npm run archive channels <guildId>                      List channels');
  console.log('  npm run archive archive <guildId> <channelId...> [--wait] Archive channels');
  console.log('  npm run archive status <runId>                          Check run status');
  console.log('');
  console.log('Options:');
  console.log('  --wait    Poll until the run completes');
}

async function main() {
  const args = process.argv.slice(2).filter((arg) => arg !== '--wait');
  const waitFlag = process.argv.includes('--wait');
  const [command, ...rest] = args;

  switch (command) {
    case 'guilds':
      await listGuilds();
      break;

    case 'channels': {
      const [guildId] = rest;
      if (!guildId) {
        console.error('❌ Please provide a guild ID');
        process.exit(1);
      }
      await listChannels(guildId);
      break;
    }

    case 'archive': {
      const [guildId, ...channelIds] = rest;
      if (!guildId || channelIds.length === 0) {
        console.error('❌ Please provide a guild ID and at least one channel ID');
        process.exit(1);
      }
      const runId = await startArchive(guildId, channelIds);
      if (waitFlag) {
        await waitForCompletion(runId);
      }
      break;
    }

    case 'status': {
      const [runId] = rest;
      if (!runId) {
        console.error('❌ Please provide a run ID');
        process.exit(1);
      }
      await checkStatus(runId);
      break;
    }

    default:
      printUsage();
  }
}

main().catch((error) => {
  console.error(getErrorMessage(error));
  process.exit(1);
});
