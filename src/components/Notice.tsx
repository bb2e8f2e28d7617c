import React from 'react';

interface NoticeProps {
  kind: 'info' | 'warning' | 'error';
  children: React.ReactNode;
}

export default function Notice({ kind, children }: NoticeProps): React.JSX.Element {
  return (
    <div className={`alert alert-${kind}`} role={kind === 'info' ? 'status' : 'alert'}>
      {children}
    </div>
  );
}
