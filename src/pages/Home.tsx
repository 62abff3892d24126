import { Header } from '../components/Header';
import { PlayerRangeControls } from '../components/PlayerRangeControls';
import { ServerReel } from '../components/ServerReel';
import { SpinButton } from '../components/SpinButton';
import { WinnerCard } from '../components/WinnerCard';
import { useRouletteContext } from '../contexts/RouletteContext';

export function Home() {
  const {
    state,
    canSpin,
    canRefresh,
    soundAvailable,
    muted,
    reelOffset,
    reelTrackRef,
    setMinPlayers,
    setMaxPlayers,
    refresh,
    spin,
    copyWinnerName,
    toggleMuted,
  } = useRouletteContext();

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100">
      <main className="mx-auto max-w-3xl px-6 pb-12 space-y-6">
        <Header soundAvailable={soundAvailable} muted={muted} onToggleSound={toggleMuted} />

        <PlayerRangeControls
          range={state.range}
          stale={state.stale}
          loading={state.phase === 'loading'}
          serverCount={state.servers.length}
          canRefresh={canRefresh}
          onMinChange={setMinPlayers}
          onMaxChange={setMaxPlayers}
          onRefresh={refresh}
        />

        <SpinButton phase={state.phase} disabled={!canSpin} onSpin={spin} />

        <ServerReel servers={state.servers} offset={reelOffset} trackRef={reelTrackRef} />

        {state.phase === 'settled' && state.winner && (
          <WinnerCard winner={state.winner} onCopy={copyWinnerName} />
        )}
      </main>
    </div>
  );
}
