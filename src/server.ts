import express, { type Request, type Response } from 'express';
import { getConfig, toServiceOptions } from './config';
import { EPGService } from './epg/service';
import { log } from './log';

export function createApp(epg: EPGService): express.Express {
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get('/epg.xml', (_req: Request, res: Response) => {
    const snap = epg.getSnapshot();
    if (!snap) { res.status(503).json({ error: 'guide not built yet' }); return; }
    res.type('application/xml').send(snap.xml);
  });

  app.get('/epg.xml.gz', (_req: Request, res: Response) => {
    const snap = epg.getSnapshot();
    if (!snap) { res.status(503).json({ error: 'guide not built yet' }); return; }
    res.type('application/gzip').send(snap.gzip);
  });

  // EPG status and build report endpoints
  app.get('/epg/status', (_req: Request, res: Response) => {
    const snap = epg.getSnapshot();
    if (!snap) { res.json({ built: false }); return; }
    res.json({
      built: true,
      builtAt: snap.builtAt,
      bytes: snap.xml.length,
      fragments: snap.fragments,
      channels: snap.report.channels,
      programmes: snap.report.programmes,
      admitted: snap.report.admitted,
      skipped: snap.report.skipped,
      written: snap.written ? snap.written.ok : null,
    });
  });

  app.get('/epg/report', (_req: Request, res: Response) => {
    const snap = epg.getSnapshot();
    if (!snap) { res.status(503).json({ error: 'guide not built yet' }); return; }
    res.json(snap.report.outcomes.map((o) => (o.ok
      ? { ok: true, ...o.location, channelId: o.value.channelId, collapsed: o.value.collapsed.length, note: o.value.note?.kind ?? null, truncatedAt: o.value.truncatedAt ?? null }
      : { ok: false, ...o.location, reason: o.reason })));
  });

  return app;
}

if (require.main === module) {
  // Hardening: log and survive unexpected errors
  process.on('uncaughtException', (err: unknown) => { log.error('uncaughtException %o', err); });
  process.on('unhandledRejection', (reason: unknown) => { log.error('unhandledRejection %o', reason); });

  const cfg = getConfig();
  const epg = new EPGService(toServiceOptions(cfg));
  epg.refresh().catch((err: unknown) => log.error('initial build failed: %s', err instanceof Error ? err.message : String(err)));
  createApp(epg).listen(cfg.port, () => log.info('listening on :%d', cfg.port));
}
