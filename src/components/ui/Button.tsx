import React from 'react';
import { Loader2 } from 'lucide-react';

type ButtonVariant = 'spin' | 'secondary' | 'ghost';
type ButtonSize = 'sm' | 'md' | 'xl';

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
  busy?: boolean;
}

const VARIANTS: Record<ButtonVariant, string> = {
  spin: 'bg-amber-400 text-slate-950 hover:bg-amber-300 rounded-2xl shadow-lg shadow-amber-500/25',
  secondary: 'bg-slate-800 text-slate-100 hover:bg-slate-700 border border-slate-600 rounded-lg',
  ghost: 'bg-transparent text-slate-400 hover:text-white hover:bg-slate-800 rounded-lg',
};

const SIZES: Record<ButtonSize, string> = {
  sm: 'px-3 py-1.5 text-xs',
  md: 'px-4 py-2 text-sm',
  xl: 'min-w-[250px] min-h-[60px] px-8 text-2xl',
};

export function Button({
  children,
  className = '',
  variant = 'secondary',
  size = 'md',
  busy = false,
  type = 'button',
  ...props
}: ButtonProps) {
  const base =
    'inline-flex items-center justify-center font-bold transition-colors duration-150 focus:outline-none disabled:opacity-50 disabled:cursor-not-allowed';

  return (
    <button type={type} className={`${base} ${VARIANTS[variant]} ${SIZES[size]} ${className}`} {...props}>
      {busy && <Loader2 className="w-4 h-4 mr-2 animate-spin" />}
      <span className="flex items-center gap-2">{children}</span>
    </button>
  );
}
