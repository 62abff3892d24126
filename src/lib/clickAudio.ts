// ─── Click playback ──────────────────────────────────────

declare global {
  interface Window {
    webkitAudioContext?: typeof AudioContext;
  }
}

export interface ClickOutput {
  /** Fire-and-forget; overlapping calls are fine. */
  play(): void;
  /** Releases the audio device. */
  close(): void;
}

export interface ClickPlayer {
  readonly available: boolean;
  readonly muted: boolean;
  setMuted(muted: boolean): void;
  play(): void;
}

/**
 * Loads the click waveform into one Web Audio buffer. Each `play()` starts a
 * fresh source node on that buffer. Returns null, after a single warning, when
 * the browser has no usable audio output.
 */
export function openWebAudioClick(samples: Float32Array, sampleRate: number): ClickOutput | null {
  const AudioContextCtor =
    typeof window === 'undefined' ? undefined : window.AudioContext || window.webkitAudioContext;
  if (typeof AudioContextCtor !== 'function') {
    console.warn('[ClickAudio] Web Audio unavailable, clicks muted');
    return null;
  }

  let ctx: AudioContext;
  let buffer: AudioBuffer;
  try {
    ctx = new AudioContextCtor();
    buffer = ctx.createBuffer(1, samples.length, sampleRate);
    buffer.getChannelData(0).set(samples);
  } catch (error: unknown) {
    console.warn('[ClickAudio] Audio output could not be opened, clicks muted', {
      message: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  return {
    play() {
      if (ctx.state === 'suspended') {
        ctx.resume().catch((error: unknown) => {
          console.warn('[ClickAudio] Resume failed', {
            message: error instanceof Error ? error.message : String(error),
          });
        });
      }
      const source = ctx.createBufferSource();
      source.buffer = buffer;
      source.connect(ctx.destination);
      source.start();
    },
    close() {
      if (ctx.state === 'closed') return;
      ctx.close().catch((error: unknown) => {
        console.warn('[ClickAudio] Close failed', {
          message: error instanceof Error ? error.message : String(error),
        });
      });
    },
  };
}

export function createClickPlayer(output: ClickOutput | null): ClickPlayer {
  let muted = false;
  return {
    available: output !== null,
    get muted() {
      return muted;
    },
    setMuted(next: boolean) {
      muted = next;
    },
    play() {
      if (muted || !output) return;
      output.play();
    },
  };
}
