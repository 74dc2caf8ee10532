// server/src/scripts/import-season-stats.ts
// Usage: tsx server/src/scripts/import-season-stats.ts 2024-25

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { config } from '../config.js';
import { sequelize } from '../db.js';
import { Player, PlayerSeasonStat, TeamSeasonStat } from '../models/index.js';
import { SeasonSchema } from '../schemas/statLine.js';
import { mapPlayerCsvRow, mapTeamCsvRow, type PlayerCsvRow, type TeamCsvRow } from '../services/csvMapping.js';

function readCsv<T>(fileName: string): T[] | null {
  const filePath = path.join(config.csvDir, fileName);
  console.log('Looking for', fileName, 'at:', filePath);

  if (!fs.existsSync(filePath)) {
    console.warn(`${fileName} not found, skipping`);
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  return parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true
  });
}

async function importPlayers(season: string) {
  const records = readCsv<PlayerCsvRow>(`player_stats_${season}.csv`);
  if (!records) return;
  console.log('Parsed player records:', records.length);

  let imported = 0;
  let skipped = 0;
  for (const [index, record] of records.entries()) {
    const mapped = mapPlayerCsvRow(record);
    if (!mapped.ok) {
      skipped++;
      console.warn(`Skipping player row ${index + 2}: ${mapped.errors.join('; ')}`);
      continue;
    }

    const { playerName, teamAbbreviation, ...totals } = mapped.value;
    await Player.upsert({
      playerId: totals.playerId,
      fullName: playerName ?? `Player ${totals.playerId}`,
      teamAbbreviation: teamAbbreviation ?? null
    });
    await PlayerSeasonStat.upsert({
      ...totals,
      season,
      teamAbbreviation: teamAbbreviation ?? null,
      rebounds: totals.offensiveRebounds + totals.defensiveRebounds
    });
    imported++;
  }

  console.log(`Imported ${imported} player season lines for ${season} (${skipped} skipped)`);
}

async function importTeams(season: string) {
  const records = readCsv<TeamCsvRow>(`team_stats_${season}.csv`);
  if (!records) return;

  let imported = 0;
  for (const [index, record] of records.entries()) {
    const mapped = mapTeamCsvRow(record);
    if (!mapped.ok) {
      console.warn(`Skipping team row ${index + 2}: ${mapped.errors.join('; ')}`);
      continue;
    }
    await TeamSeasonStat.upsert({ ...mapped.value, season });
    imported++;
  }

  console.log(`Imported ${imported} team season lines for ${season}`);
}

async function main() {
  const parsed = SeasonSchema.safeParse(process.argv[2] ?? config.defaultSeason);
  if (!parsed.success) {
    console.error('Usage: import-season-stats <season>, e.g. 2024-25');
    process.exitCode = 1;
    return;
  }
  const season = parsed.data;

  try {
    await sequelize.sync();
    await importPlayers(season);
    await importTeams(season);
  } catch (error) {
    console.error('Import failed:', error);
    process.exitCode = 1;
  } finally {
    await sequelize.close();
  }
}

main().catch(error => {
  console.error('Import failed:', error);
  process.exitCode = 1;
});
