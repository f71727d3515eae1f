import React, { useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import type { EventBus } from '../events/eventBus.js';
import type { GameEvent } from '../events/types.js';
import { logger, type LogEntry } from '../logger.js';
import type { Role } from '../types.js';

type PovMode = 'ALL' | 'PUBLIC' | { player: string };
type ViewMode = 'LOG' | 'TABLE';

export interface AppProps {
  players: Array<{ id: string; model: string }>;
  events: EventBus<GameEvent>;
}

interface SeatStatus {
  eliminated: boolean;
  role?: Role;
  clues: string[];
}

function formatTime(iso: string): string {
  const t = iso.split('T')[1];
  if (!t) return iso;
  return t.split('.')[0] ?? t;
}

function typeColor(type: LogEntry['type']): string | undefined {
  switch (type) {
    case 'SYSTEM':
    case 'THOUGHT':
      return 'gray';
    case 'CLUE':
      return 'cyan';
    case 'VOTE':
      return 'blue';
    case 'ELIMINATION':
    case 'ERROR':
      return 'red';
    case 'WARN':
      return 'yellow';
    case 'WIN':
      return 'green';
    default:
      return undefined;
  }
}

function roleColor(role: Role | undefined): string | undefined {
  if (role === 'imposter') return 'redBright';
  if (role === 'non_imposter') return 'green';
  return undefined;
}

function entryToPlainText(entry: LogEntry): string {
  const time = formatTime(entry.timestamp);
  const prefix = entry.player ? `[${time}] [${entry.type}] <${entry.player}>: ` : `[${time}] [${entry.type}]: `;
  return `${prefix}${entry.content}`;
}

function estimateWrappedLines(text: string, width: number): number {
  if (width <= 0) return 0;
  // Approximation by character width; only used to pick the tail that fits.
  let lines = 0;
  for (const p of text.split('\n')) lines += Math.max(1, Math.ceil(p.length / width));
  return lines;
}

export function App(props: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [dimensions, setDimensions] = useState(() => ({
    columns: stdout.columns ?? 80,
    rows: stdout.rows ?? 24,
  }));

  const [showThoughts, setShowThoughts] = useState(false);
  const [pov, setPov] = useState<PovMode>('ALL');
  const [view, setView] = useState<ViewMode>('LOG');
  const [entries, setEntries] = useState<LogEntry[]>(() => logger.getLogs());
  const [seats, setSeats] = useState<Record<string, SeatStatus>>(() =>
    Object.fromEntries(props.players.map(p => [p.id, { eliminated: false, clues: [] }]))
  );
  const [thinking, setThinking] = useState<string | null>(null);
  const [status, setStatus] = useState('Starting');
  const [scrollFromBottomRows, setScrollFromBottomRows] = useState(0);
  const prevTotalRowsRef = useRef<number>(0);

  const povOrder: PovMode[] = useMemo(
    () => ['ALL', 'PUBLIC', ...props.players.map(p => ({ player: p.id }) as const)],
    [props.players]
  );

  useEffect(() => {
    const onResize = () => setDimensions({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    return logger.subscribe(e => {
      setEntries(prev => {
        const next = [...prev, e];
        return next.length > 5000 ? next.slice(-5000) : next;
      });
    });
  }, []);

  useEffect(() => {
    const patch = (id: string, update: (s: SeatStatus) => SeatStatus) =>
      setSeats(prev => {
        const cur = prev[id];
        return cur ? { ...prev, [id]: update(cur) } : prev;
      });

    return props.events.subscribe(event => {
      switch (event.type) {
        case 'round_start':
          setStatus(`Round ${event.round}/${event.totalRounds}`);
          break;
        case 'voting_round_start':
          setStatus(`Voting ${event.votingRound}/${event.totalVotingRounds}`);
          break;
        case 'player_thinking':
          setThinking(`${event.playerId} (${event.action}, ${event.playerIndex + 1}/${event.totalPlayers})`);
          break;
        case 'clue':
          setThinking(null);
          patch(event.playerId, s => ({ ...s, clues: [...s.clues, event.clue] }));
          break;
        case 'vote':
        case 'discussion':
          setThinking(null);
          break;
        case 'elimination':
          patch(event.playerId, s => ({ ...s, eliminated: true }));
          break;
        case 'game_complete':
          setThinking(null);
          setStatus(`Finished: ${event.result.outcome}`);
          for (const p of event.result.players) patch(p.id, s => ({ ...s, role: p.role }));
          break;
        case 'error':
          setThinking(null);
          setStatus(`Failed: ${event.code}`);
          break;
        default:
          break;
      }
    });
  }, [props.events]);

  const headerRows = 3;
  const logBoxHeight = Math.max(3, dimensions.rows - headerRows);
  const logContentRows = Math.max(1, logBoxHeight - 2);
  const logContentWidth = Math.max(10, dimensions.columns - 4);
  const pageRows = Math.max(1, Math.floor(logContentRows * 0.9));

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit();
      return;
    }
    if (key.upArrow) setScrollFromBottomRows(v => v + 1);
    else if (key.downArrow) setScrollFromBottomRows(v => Math.max(0, v - 1));
    else if (key.pageUp) setScrollFromBottomRows(v => v + pageRows);
    else if (key.pageDown) setScrollFromBottomRows(v => Math.max(0, v - pageRows));
    else if (input === 'G') setScrollFromBottomRows(Number.POSITIVE_INFINITY);
    else if (input === 'g') setScrollFromBottomRows(0);
    else if (input === 't') setShowThoughts(v => !v);
    else if (input === 'v') setView(v => (v === 'LOG' ? 'TABLE' : 'LOG'));
    else if (input === 'p' || input === ']' || input === '[') {
      const step = input === '[' ? -1 : 1;
      setPov(current => {
        const idx = povOrder.findIndex(m => JSON.stringify(m) === JSON.stringify(current));
        return povOrder[(idx + step + povOrder.length) % povOrder.length] ?? 'ALL';
      });
    }
  });

  const visibleEntries = useMemo(() => {
    const povPlayer = typeof pov === 'object' ? pov.player : null;
    return entries.filter(e => {
      const isPrivate = e.type === 'THOUGHT' || e.metadata?.visibility === 'private';
      if (e.type === 'THOUGHT' && !showThoughts) return false;
      if (pov === 'ALL') return true;
      if (pov === 'PUBLIC') return !isPrivate;
      return !isPrivate || e.player === povPlayer;
    });
  }, [entries, pov, showThoughts]);

  const metrics = useMemo(
    () => visibleEntries.map(e => ({ entry: e, rows: estimateWrappedLines(entryToPlainText(e), logContentWidth) })),
    [visibleEntries, logContentWidth]
  );
  const totalRows = useMemo(() => metrics.reduce((acc, m) => acc + m.rows, 0), [metrics]);
  const maxScrollFromBottom = Math.max(0, totalRows - logContentRows);

  useEffect(() => {
    // Hold the viewport still while scrolled up and new rows arrive.
    const prev = prevTotalRowsRef.current;
    if (prev !== 0 && totalRows > prev) {
      const delta = totalRows - prev;
      setScrollFromBottomRows(v => (v > 0 ? v + delta : 0));
    }
    prevTotalRowsRef.current = totalRows;
  }, [totalRows]);

  const clampedScroll = Math.min(scrollFromBottomRows, maxScrollFromBottom);

  const lines = useMemo(() => {
    if (metrics.length === 0) return [];
    const endRowExclusive = Math.max(0, totalRows - clampedScroll);
    const startRowInclusive = Math.max(0, endRowExclusive - logContentRows);
    const picked: LogEntry[] = [];
    let cursor = 0;
    for (const m of metrics) {
      const nextCursor = cursor + m.rows;
      if (nextCursor > startRowInclusive && cursor < endRowExclusive) picked.push(m.entry);
      cursor = nextCursor;
      if (cursor >= endRowExclusive) break;
    }
    if (picked.length === 0) return [metrics[metrics.length - 1]!.entry];
    return picked;
  }, [clampedScroll, logContentRows, metrics, totalRows]);

  const headerPov = pov === 'ALL' || pov === 'PUBLIC' ? pov : pov.player;

  return (
    <Box flexDirection="column" width={dimensions.columns} height={dimensions.rows} overflow="hidden">
      <Box flexShrink={0}>
        <Text bold>Imposter Arena</Text>
        <Text>  </Text>
        <Text color="gray">{status}</Text>
        <Text>  </Text>
        <Text color="gray">POV:</Text>
        <Text> {headerPov}</Text>
        <Text>  </Text>
        <Text color="gray">Thoughts:</Text>
        <Text> {showThoughts ? 'on' : 'off'}</Text>
      </Box>
      <Box flexShrink={0}>
        {thinking ? <Text color="magenta">Waiting on {thinking}...</Text> : <Text> </Text>}
      </Box>
      <Box flexShrink={0}>
        <Text color="gray">Keys: </Text>
        <Text>t thoughts</Text>
        <Text color="gray"> | </Text>
        <Text>v table/log</Text>
        <Text color="gray"> | </Text>
        <Text>↑/↓ pgUp/pgDn scroll</Text>
        <Text color="gray"> | </Text>
        <Text>G top / g bottom</Text>
        <Text color="gray"> | </Text>
        <Text>p/] [ POV</Text>
        <Text color="gray"> | </Text>
        <Text>q/esc quit</Text>
      </Box>
      {view === 'TABLE' ? (
        <Box borderStyle="round" flexDirection="column" paddingX={1} height={logBoxHeight} overflow="hidden">
          {props.players.map(p => {
            const seat = seats[p.id];
            return (
              <Text key={p.id} wrap="truncate-end">
                <Text color={seat?.eliminated ? 'gray' : 'yellow'}>{p.id}</Text>
                <Text color="gray"> [{p.model}]</Text>
                {seat?.role ? <Text color={roleColor(seat.role)}> {seat.role}</Text> : null}
                {seat?.eliminated ? <Text color="red"> (out)</Text> : null}
                <Text>: {seat?.clues.join(', ') ?? ''}</Text>
              </Text>
            );
          })}
        </Box>
      ) : (
        <Box borderStyle="round" flexDirection="column" paddingX={1} height={logBoxHeight} overflow="hidden" flexGrow={1}>
          {lines.map(e => (
            <Text key={e.id} wrap="wrap">
              <Text color="gray">[{formatTime(e.timestamp)}]</Text> <Text color={typeColor(e.type)}>{`[${e.type}]`}</Text>
              {e.player ? (
                <>
                  <Text> </Text>
                  <Text color="yellow">{`<${e.player}`}</Text>
                  {seats[e.player]?.role ? (
                    <Text color={roleColor(seats[e.player]?.role)}>{`:${seats[e.player]?.role}`}</Text>
                  ) : null}
                  <Text color="yellow">&gt;</Text>
                </>
              ) : null}
              <Text>: </Text>
              <Text>{e.content}</Text>
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
