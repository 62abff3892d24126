import React, { createContext, useContext } from 'react';
import {
  useServerRoulette,
  type ServerRouletteApi,
  type UseServerRouletteOptions,
} from '../hooks/useServerRoulette';

const RouletteContext = createContext<ServerRouletteApi | null>(null);

export function RouletteProvider({
  children,
  options,
}: {
  children: React.ReactNode;
  options?: UseServerRouletteOptions;
}) {
  const roulette = useServerRoulette(options);
  return <RouletteContext.Provider value={roulette}>{children}</RouletteContext.Provider>;
}

export function useRouletteContext(): ServerRouletteApi {
  const ctx = useContext(RouletteContext);
  if (!ctx) throw new Error('useRouletteContext must be used within RouletteProvider');
  return ctx;
}
