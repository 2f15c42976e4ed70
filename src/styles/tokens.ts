// Design tokens for the tooltip and the demo page

export const colors = {
  tooltip: {
    background: 'rgba(0, 0, 0, 0.8)', // Translucent black body and arrow
    text: '#ffffff',
  },

  // Demo page
  bg: {
    page: '#f5f5f7',
    card: '#ffffff',
    accent: '#3b82f6',
    accentMuted: 'rgba(59, 130, 246, 0.1)',
    listRowAlt: '#fafafa',
  },

  border: {
    primary: '#e5e7eb',
    accent: '#1d4ed8',
  },

  text: {
    primary: '#111827',
    secondary: '#4b5563',
    inverse: '#ffffff',
  },
} as const;

export const spacing = {
  '1': '4px',
  '2': '8px',
  '3': '12px',
  '4': '16px',
  '6': '24px',
} as const;

// Numeric because the geometry layer needs them as numbers
export const borderRadius = {
  sm: 4,
  tooltip: 8,
  card: 12,
} as const;

export const fontSize = {
  sm: '13px',
  md: '14px',
  lg: '18px',
} as const;

export const zIndex = {
  tooltip: 9999,
} as const;

// Tooltip body padding, vertical then horizontal
export const tooltipPadding = {
  vertical: 8,
  horizontal: 12,
} as const;

// Measurement happens here, far outside any viewport
export const OFFSCREEN_COORDINATE = -9999;
