import { useMemo, type RefObject } from 'react';
import { Map as MapIcon, Users } from 'lucide-react';
import { REEL_VIEWPORT_HEIGHT, ROW_HEIGHT } from '../lib/constants';
import { buildReelRows, reelTranslateY } from '../lib/reelUtils';
import type { Listing, ServerRecord } from '../types';

interface ServerReelProps {
  servers: Listing;
  /** Offset applied on render; the spin loop writes the transform directly in between. */
  offset: number;
  trackRef: RefObject<HTMLDivElement>;
}

function ReelRowCard({ server }: { server: ServerRecord }) {
  return (
    <div className="flex items-center justify-center px-2" style={{ height: ROW_HEIGHT }}>
      <div className="w-full h-[72px] flex flex-col items-center justify-center rounded-lg border border-slate-700 bg-slate-800/60">
        <div className="text-lg font-bold text-sky-300 truncate max-w-full px-3">{server.name}</div>
        <div className="flex items-center gap-4 text-sm text-slate-300">
          <span className="flex items-center gap-1">
            <MapIcon className="w-3.5 h-3.5" />
            {server.map}
          </span>
          <span className="flex items-center gap-1 text-yellow-300 tabular-nums">
            <Users className="w-3.5 h-3.5" />
            {`${server.players}/${server.maxPlayers}`}
          </span>
        </div>
      </div>
    </div>
  );
}

export function ServerReel({ servers, offset, trackRef }: ServerReelProps) {
  const rows = useMemo(() => buildReelRows(servers), [servers]);

  return (
    <div
      className="relative overflow-hidden rounded-xl border border-slate-700 bg-black/90"
      style={{ height: REEL_VIEWPORT_HEIGHT }}
      data-testid="server-reel"
    >
      {servers.length === 0 ? (
        <div className="flex h-full items-center justify-center text-slate-400">
          The list is empty. Refresh the servers!
        </div>
      ) : (
        <div
          ref={trackRef}
          className="will-change-transform"
          style={{ transform: `translateY(${reelTranslateY(offset)}px)` }}
          data-testid="reel-track"
        >
          {rows.map((row) => (
            <ReelRowCard key={row.key} server={row.server} />
          ))}
        </div>
      )}

      {/* Marker */}
      <div className="pointer-events-none absolute inset-x-0 top-1/2 -translate-y-1/2 flex items-center">
        <div className="h-[3px] flex-1 bg-red-500" />
        <span className="ml-1 mr-2 text-3xl leading-none text-red-500">◄</span>
      </div>
    </div>
  );
}
