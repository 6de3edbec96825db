import { GageRecord, GageType } from '@/types/gage';

export type GageSelection =
  | { kind: 'all' }
  | { kind: 'type'; gageType: GageType }
  | { kind: 'reverse' }
  | { kind: 'id'; gageId: string };

export type ParsedArgs =
  | { ok: true; selection: GageSelection; verbose: boolean }
  | { ok: false; message: string };

export const USAGE = 'usage: river-graphs-fetch [usgs | dwr | wyseo | prr | virtual | reverse | --verbose | --id <gage_id>]';

const TYPE_FILTERS: Record<string, GageType> = {
  usgs: 'USGS',
  dwr: 'DWR',
  wyseo: 'WYSEO',
  prr: 'PRR',
  virtual: 'VIRTUAL',
};

/**
 * No arguments runs every gage quietly and paced; any filter turns on
 * verbose, unpaced mode for interactive use.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.length === 0) {
    return { ok: true, selection: { kind: 'all' }, verbose: false };
  }

  if (argv.length === 1) {
    const option = argv[0].toLowerCase();
    const gageType = TYPE_FILTERS[option];
    if (gageType) {
      return { ok: true, selection: { kind: 'type', gageType }, verbose: true };
    }
    if (option === 'reverse') {
      return { ok: true, selection: { kind: 'reverse' }, verbose: true };
    }
    if (option === '--verbose') {
      return { ok: true, selection: { kind: 'all' }, verbose: true };
    }
    return { ok: false, message: `Unknown option: ${argv[0]}` };
  }

  if (argv.length === 2 && argv[0].toLowerCase() === '--id') {
    return { ok: true, selection: { kind: 'id', gageId: argv[1] }, verbose: true };
  }

  return { ok: false, message: `This isn't valid: ${argv.join(' ')}` };
}

export function selectGages<T extends GageRecord>(gages: T[], selection: GageSelection): T[] {
  switch (selection.kind) {
    case 'all':
      return [...gages];
    case 'type':
      return gages.filter(gage => gage.gageType === selection.gageType);
    case 'reverse':
      return [...gages].reverse();
    case 'id':
      return gages.filter(gage => gage.gageId === selection.gageId);
  }
}
