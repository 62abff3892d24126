import { useEffect, useState } from 'react';
import { Check, Copy, PartyPopper } from 'lucide-react';
import Confetti from 'react-confetti';
import type { ServerRecord } from '../types';
import { Button } from './ui/Button';
import { Card } from './ui/Card';

interface WinnerCardProps {
  winner: ServerRecord;
  onCopy: () => Promise<boolean>;
}

export function WinnerCard({ winner, onCopy }: WinnerCardProps) {
  const [copied, setCopied] = useState(false);
  const [windowSize, setWindowSize] = useState({
    width: window.innerWidth,
    height: window.innerHeight,
  });

  useEffect(() => {
    const handleResize = () =>
      setWindowSize({ width: window.innerWidth, height: window.innerHeight });
    window.addEventListener('resize', handleResize);
    return () => window.removeEventListener('resize', handleResize);
  }, []);

  // New winner, fresh copy state
  useEffect(() => {
    setCopied(false);
  }, [winner]);

  const handleCopy = async () => {
    setCopied(await onCopy());
  };

  return (
    <>
      <Confetti
        width={windowSize.width}
        height={windowSize.height}
        recycle={false}
        numberOfPieces={250}
      />
      <div className="flex justify-center">
        <Card highlight className="min-w-[300px] px-8 py-6 text-center space-y-2">
          <div className="flex items-center justify-center gap-2 text-base text-slate-300">
            <PartyPopper className="w-4 h-4" />
            WINNER:
          </div>
          <div className="text-2xl font-bold text-emerald-400">{winner.name}</div>
          <div className="text-lg italic text-slate-300">{`Map: ${winner.map}`}</div>
          <div className="pt-2">
            <Button size="sm" onClick={() => void handleCopy()}>
              {copied ? <Check className="w-4 h-4" /> : <Copy className="w-4 h-4" />}
              {copied ? 'Copied' : 'Copy name'}
            </Button>
          </div>
        </Card>
      </div>
    </>
  );
}
