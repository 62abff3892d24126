import { AlertTriangle, RefreshCw, Server } from 'lucide-react';
import { PLAYER_RANGE_MAX, PLAYER_RANGE_MIN } from '../lib/constants';
import type { PlayerRange } from '../types';
import { Button } from './ui/Button';
import { Card } from './ui/Card';

interface PlayerRangeControlsProps {
  range: PlayerRange;
  stale: boolean;
  loading: boolean;
  serverCount: number;
  canRefresh: boolean;
  onMinChange: (value: number) => void;
  onMaxChange: (value: number) => void;
  onRefresh: () => void;
}

function RangeSlider({
  label,
  shortLabel,
  value,
  onChange,
}: {
  label: string;
  shortLabel: string;
  value: number;
  onChange: (value: number) => void;
}) {
  return (
    <label className="flex items-center gap-3 text-sm text-slate-300">
      <input
        type="range"
        min={PLAYER_RANGE_MIN}
        max={PLAYER_RANGE_MAX}
        step={1}
        value={value}
        aria-label={label}
        onChange={(e) => onChange(Number(e.target.value))}
        className="w-64 accent-amber-400"
      />
      <span className="w-16 tabular-nums">
        {`${shortLabel} ${value}`}
      </span>
    </label>
  );
}

export function PlayerRangeControls({
  range,
  stale,
  loading,
  serverCount,
  canRefresh,
  onMinChange,
  onMaxChange,
  onRefresh,
}: PlayerRangeControlsProps) {
  return (
    <Card className="p-5 space-y-4">
      <div className="flex flex-wrap items-center gap-4">
        <span className="text-lg font-semibold text-white">Players:</span>
        <RangeSlider label="Minimum players" shortLabel="min" value={range.min} onChange={onMinChange} />
        <RangeSlider label="Maximum players" shortLabel="max" value={range.max} onChange={onMaxChange} />
      </div>

      <div className="flex items-center gap-4">
        <Button onClick={onRefresh} disabled={!canRefresh} busy={loading}>
          {!loading && <RefreshCw className="w-4 h-4" />}
          Refresh
        </Button>
        {stale ? (
          <span className="flex items-center gap-1.5 text-sm font-medium text-yellow-400">
            <AlertTriangle className="w-4 h-4" />
            List is out of date
          </span>
        ) : (
          <span className="flex items-center gap-1.5 text-sm font-medium text-emerald-400">
            <Server className="w-4 h-4" />
            {`Servers: ${serverCount}`}
          </span>
        )}
      </div>
    </Card>
  );
}
