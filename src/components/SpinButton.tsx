import React from 'react';
import { Hourglass, Loader2, RotateCcw, Sparkles } from 'lucide-react';
import type { RoulettePhase } from '../types';
import { Button } from './ui/Button';

interface SpinButtonProps {
  phase: RoulettePhase;
  disabled: boolean;
  onSpin: () => void;
}

const PHASE_LABELS: Record<RoulettePhase, { label: string; icon: React.ElementType }> = {
  idle: { label: 'Spin!', icon: Sparkles },
  loading: { label: 'Loading…', icon: Hourglass },
  spinning: { label: 'Spinning…', icon: Loader2 },
  settled: { label: 'Spin again!', icon: RotateCcw },
};

export function SpinButton({ phase, disabled, onSpin }: SpinButtonProps) {
  const { label, icon: Icon } = PHASE_LABELS[phase];

  return (
    <div className="flex justify-center">
      <Button variant="spin" size="xl" disabled={disabled} onClick={onSpin}>
        <Icon className={`w-6 h-6 ${phase === 'spinning' ? 'animate-spin' : ''}`} />
        {label}
      </Button>
    </div>
  );
}
