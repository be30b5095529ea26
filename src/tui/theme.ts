export const theme = {
  brand: 'green',
  accent: 'cyan',
  muted: 'gray',
  border: 'gray',
  panelTitle: 'gray',
  source: 'blue',
  status: {
    ok: 'green',
    warning: 'yellow',
    error: 'red',
  },
} as const;

export type PanelTone = 'neutral' | 'accent' | 'muted' | 'warning';
