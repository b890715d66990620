import fs from 'fs';

export const HEADER = 'Book,Sport,MarketType,OddsPlaced,ClosingOdds,Stake,BetTime,EventTime,Result';

export function readSampleCsv(): string {
  return fs.readFileSync(new URL('../engine/fixtures/sample_history.csv', import.meta.url), 'utf8');
}

export function csvFrom(header: string, rows: string[]): string {
  return [header, ...rows].join('\n') + '\n';
}
