import { Dices, Volume2, VolumeX } from 'lucide-react';

interface HeaderProps {
  soundAvailable: boolean;
  muted: boolean;
  onToggleSound: () => void;
}

export function Header({ soundAvailable, muted, onToggleSound }: HeaderProps) {
  const silent = muted || !soundAvailable;
  const SoundIcon = silent ? VolumeX : Volume2;

  return (
    <header className="flex items-center justify-between py-4">
      <div className="w-9" />
      <h1 className="flex items-center gap-3 text-3xl font-extrabold tracking-wide text-amber-400">
        <Dices className="w-8 h-8" />
        SQUAD EU ROULETTE
      </h1>
      <button
        type="button"
        onClick={onToggleSound}
        disabled={!soundAvailable}
        aria-label={silent ? 'Unmute clicks' : 'Mute clicks'}
        title={soundAvailable ? undefined : 'Audio output unavailable'}
        className="p-2 rounded-lg text-slate-400 hover:text-white hover:bg-slate-800 disabled:opacity-40"
      >
        <SoundIcon className="w-5 h-5" />
      </button>
    </header>
  );
}
