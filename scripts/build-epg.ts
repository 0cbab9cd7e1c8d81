/*
Build the guide once and exit.
- Reads the events feed (EPG_FEED_FILE or EPG_FEED_URL)
- Downloads the external fragments listed in EPG_FRAGMENT_URLS / EPG_FRAGMENT_PROGRAMMES_ONLY_URLS
- Writes epg.xml and epg.xml.gz into EPG_OUTPUT_DIR (default: output)

Usage:
  npm run build && npm run build-epg
*/

import { getConfig, toServiceOptions } from '../src/config';
import { EPGService } from '../src/epg/service';
import { log } from '../src/log';

async function main(): Promise<number> {
  const cfg = getConfig();
  // One-shot: never schedule.
  const epg = new EPGService({ ...toServiceOptions(cfg), refreshCron: undefined });
  const snap = await epg.refresh();
  if (snap.written && !snap.written.ok) return 1;
  return 0;
}

main()
  .then((code) => { process.exitCode = code; })
  .catch((err: unknown) => {
    log.error('build failed: %s', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
