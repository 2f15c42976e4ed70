import { useEffect, useRef, useState, ReactNode, CSSProperties } from 'react';
import { Tooltip } from './components/Tooltip';
import { attachTooltip } from './attachTooltip';
import type { Direction } from './types/tooltip';
import { colors, spacing, borderRadius, fontSize } from './styles/tokens';

type DemoTab = 'basic' | 'directions' | 'list';

const TABS: { id: DemoTab; label: string }[] = [
  { id: 'basic', label: 'Basic' },
  { id: 'directions', label: 'Directions' },
  { id: 'list', label: 'List' },
];

const LIST_ITEM_COUNT = 25;

const chipStyle: CSSProperties = {
  display: 'inline-block',
  padding: `${spacing['2']} ${spacing['3']}`,
  borderRadius: borderRadius.card,
  border: `1px solid ${colors.border.primary}`,
  backgroundColor: colors.bg.card,
  color: colors.text.primary,
  fontSize: fontSize.md,
  userSelect: 'none',
};

function Chip({ children }: { children: ReactNode }) {
  return <span style={chipStyle}>{children}</span>;
}

// Options come from data-tooltip-* attributes, no <Tooltip> wrapper
function AttachedChip() {
  const ref = useRef<HTMLSpanElement>(null);

  useEffect(() => {
    const element = ref.current;
    if (!element) return;
    const attachment = attachTooltip(element, 'Attached from data attributes');
    return () => attachment.detach();
  }, []);

  return (
    <span
      ref={ref}
      data-tooltip-direction="right"
      data-tooltip-duration="2000"
      style={{ ...chipStyle, cursor: 'pointer' }}
    >
      Attached
    </span>
  );
}

function BasicExamples() {
  return (
    <div style={{ display: 'flex', flexWrap: 'wrap', gap: spacing['6'], padding: spacing['4'] }}>
      <Tooltip content="Simple tooltip with default styling">
        <Chip>Default</Chip>
      </Tooltip>
      <Tooltip preferredDirection="down" content="Appears below (preferred down)">
        <Chip>Down</Chip>
      </Tooltip>
      <Tooltip autoHideDuration={3000} content="Auto hides after 3 seconds">
        <Chip>Timer</Chip>
      </Tooltip>
      <Tooltip
        backgroundColor="rgba(38, 50, 56, 0.9)"
        cornerRadius={12}
        content={<span>ℹ︎ Custom color &amp; radius</span>}
      >
        <Chip>Palette</Chip>
      </Tooltip>
      <Tooltip
        borderColor={colors.border.accent}
        borderWidth={2}
        backgroundColor={colors.bg.accent}
        content="Bordered tooltip: the arrow's base stays unstroked"
      >
        <Chip>Border</Chip>
      </Tooltip>
      <Tooltip mainAxisWidth={260} content="Width override for up/down tooltips.">
        <Chip>Wide</Chip>
      </Tooltip>
      <Tooltip sideAxisWidth={180} preferredDirection="right" content="Custom width for side tooltip.">
        <Chip>Side width</Chip>
      </Tooltip>
      <AttachedChip />
    </div>
  );
}

function DirectionTile({ label, direction }: { label: string; direction: Direction }) {
  return (
    <Tooltip preferredDirection={direction} content={`${label} tooltip`}>
      <div
        style={{
          width: 80,
          height: 80,
          borderRadius: borderRadius.card,
          backgroundColor: colors.bg.accentMuted,
          display: 'flex',
          alignItems: 'center',
          justifyContent: 'center',
          fontWeight: 600,
          color: colors.text.primary,
        }}
      >
        {label}
      </div>
    </Tooltip>
  );
}

function DirectionExamples() {
  return (
    <div
      style={{
        display: 'flex',
        flexWrap: 'wrap',
        gap: '32px',
        justifyContent: 'center',
        alignItems: 'center',
        minHeight: '60vh',
      }}
    >
      <DirectionTile label="Up" direction="up" />
      <DirectionTile label="Down" direction="down" />
      <DirectionTile label="Left" direction="left" />
      <DirectionTile label="Right" direction="right" />
    </div>
  );
}

// Tooltips here close as soon as the list scrolls
function ListExamples() {
  return (
    <div style={{ height: '70vh', overflowY: 'auto', padding: spacing['3'] }}>
      {Array.from({ length: LIST_ITEM_COUNT }, (_, index) => (
        <div
          key={index}
          style={{
            display: 'flex',
            alignItems: 'center',
            justifyContent: 'space-between',
            padding: `${spacing['3']} ${spacing['4']}`,
            borderBottom: `1px solid ${colors.border.primary}`,
            backgroundColor: index % 2 === 0 ? colors.bg.card : colors.bg.listRowAlt,
          }}
        >
          <span style={{ color: colors.text.primary }}>Item #{index}</span>
          <Tooltip preferredDirection="left" content={`Tooltip for item ${index}. Scroll to auto-hide.`}>
            <Chip>info</Chip>
          </Tooltip>
        </div>
      ))}
    </div>
  );
}

export default function App() {
  const [tab, setTab] = useState<DemoTab>('basic');

  return (
    <div style={{ minHeight: '100vh', backgroundColor: colors.bg.page, fontFamily: 'system-ui, sans-serif' }}>
      <header style={{ padding: spacing['4'], borderBottom: `1px solid ${colors.border.primary}` }}>
        <h1 style={{ margin: 0, fontSize: fontSize.lg, color: colors.text.primary }}>Anchored tooltip examples</h1>
        <nav style={{ display: 'flex', gap: spacing['2'], marginTop: spacing['3'] }}>
          {TABS.map(({ id, label }) => (
            <button
              key={id}
              type="button"
              onClick={() => setTab(id)}
              style={{
                padding: `${spacing['1']} ${spacing['3']}`,
                borderRadius: borderRadius.sm,
                border: `1px solid ${tab === id ? colors.bg.accent : colors.border.primary}`,
                backgroundColor: tab === id ? colors.bg.accent : colors.bg.card,
                color: tab === id ? colors.text.inverse : colors.text.secondary,
                cursor: 'pointer',
              }}
            >
              {label}
            </button>
          ))}
        </nav>
      </header>
      {tab === 'basic' && <BasicExamples />}
      {tab === 'directions' && <DirectionExamples />}
      {tab === 'list' && <ListExamples />}
    </div>
  );
}
