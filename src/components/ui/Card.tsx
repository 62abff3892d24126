import React from 'react';

interface CardProps extends React.HTMLAttributes<HTMLDivElement> {
  highlight?: boolean;
}

export function Card({
  children,
  className = '',
  highlight = false,
  ...props
}: CardProps) {
  const base = 'rounded-xl border transition-all duration-200';
  const tone = highlight
    ? 'bg-slate-900 border-emerald-500/60 shadow-glow'
    : 'bg-slate-900/80 border-slate-700';

  return (
    <div className={`${base} ${tone} ${className}`} {...props}>
      {children}
    </div>
  );
}
