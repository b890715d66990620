import fs from 'fs';
import { fileURLToPath } from 'url';
import { analyzeCsv } from '../lib/analyze';
import { logger } from '../lib/logger';
import type { AnalysisOk, RiskBand } from '../engine/src';

const SAMPLE_PATH = fileURLToPath(new URL('../engine/fixtures/sample_history.csv', import.meta.url));

const BADGES: Record<RiskBand, string> = {
    low: '🟢',
    elevated: '🟠',
    high: '🔴',
};

export function formatReport(result: AnalysisOk): string {
    const { metrics, profile, distributions } = result;
    const lines: string[] = [];
    const rule = '='.repeat(60);

    lines.push(rule);
    lines.push('📈 Limit Risk Report');
    lines.push(rule);

    lines.push(`\nLimit Risk Score: ${BADGES[profile.band]} ${profile.score.toFixed(1)}/100`);
    lines.push(`Avg CLV: ${metrics.avgCLV.toFixed(2)}%`);
    lines.push(`% Bets Beating Close: ${(metrics.posCLVRate * 100).toFixed(1)}%`);
    lines.push(`Rows scored: ${metrics.sampleSize} (${result.dropped} dropped)`);

    lines.push('\n--- Metrics ---');
    lines.push(`   Stake CV:        ${metrics.stakeCV.toFixed(2)}%`);
    lines.push(`   Market HHI:      ${metrics.marketHHI.toFixed(3)}`);
    lines.push(`   Book HHI:        ${metrics.bookHHI.toFixed(3)}`);
    lines.push(`   Lead mean (h):   ${metrics.leadMean.toFixed(2)}`);
    lines.push(`   Lead std (h):    ${metrics.leadStd.toFixed(2)}`);

    lines.push('\n--- Sub-risks ---');
    for (const [key, value] of Object.entries(profile.subRisks)) {
        lines.push(`   ${key.padEnd(10)} ${value.toFixed(2)}`);
    }

    lines.push('\n--- Markets Hit (Top 10) ---');
    for (const m of distributions.topMarkets) {
        lines.push(`   ${m.value.padEnd(16)} ${m.count}`);
    }

    lines.push('\n--- Recommendations ---');
    for (const r of profile.recommendations) {
        lines.push(`• ${r}`);
    }

    lines.push('\n' + rule);
    return lines.join('\n');
}

function main() {
    const arg = process.argv[2];

    if (!arg) {
        console.log('Usage: npx tsx scripts/analyze_history.ts <history.csv>');
        console.log('       npx tsx scripts/analyze_history.ts --sample');
        process.exit(1);
    }

    const path = arg === '--sample' ? SAMPLE_PATH : arg;

    let text: string;
    try {
        text = fs.readFileSync(path, 'utf8');
    } catch (err) {
        logger.error('analyze_history', `Could not read ${path}`, err);
        process.exit(1);
    }

    const result = analyzeCsv(text);

    if (result.status === 'missing_columns') {
        console.error(`❌ Missing required columns: ${result.missing.join(', ')}`);
        process.exit(1);
    }
    if (result.status === 'no_valid_rows') {
        console.error(`❌ No valid rows after cleaning (${result.dropped} dropped). Check your CSV formatting.`);
        process.exit(1);
    }

    console.log(formatReport(result));
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
    main();
}
