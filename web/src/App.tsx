import React, { useCallback, useEffect, useMemo, useState, useTransition } from 'react';
import { ArrowLeft, Loader2, Music, RefreshCw } from 'lucide-react';
import { Link, Route, Routes, useNavigate, useParams } from 'react-router-dom';
import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  PolarAngleAxis,
  PolarGrid,
  PolarRadiusAxis,
  Radar,
  RadarChart,
  ResponsiveContainer,
  Scatter,
  ScatterChart,
  Tooltip,
  XAxis,
  YAxis
} from 'recharts';
import { Badge } from './components/ui/badge';
import { Button } from './components/ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from './components/ui/card';
import { Select } from './components/ui/select';
import type { TrackLoader } from './lib/loader';
import {
  DEFAULT_SCATTER_X,
  DEFAULT_SCATTER_Y,
  FINGERPRINT_FEATURES,
  SCATTER_FEATURES,
  TREND_FEATURES,
  isScatterFeature
} from './lib/tracks';
import type { ScatterFeature, TrackTable, TrendFeature } from './lib/tracks';
import {
  availableDecades,
  describeScatter,
  filterByDecades,
  fingerprint,
  resolveFocusDecade,
  sampleTracks,
  scatterPoints,
  topSongs,
  yearlyMeans
} from './lib/views';
import type { ScatterPoint } from './lib/views';

type Status = 'loading' | 'ready' | 'error';

const TREND_COLORS: Record<TrendFeature, string> = {
  danceability: '#1DB954',
  energy: '#F9A825',
  valence: '#2196F3',
  acousticness: '#607D8B'
};

const DECADE_PALETTE = ['#440154', '#443983', '#31688e', '#21918c', '#35b779', '#90d743', '#fde725'];

const FOCUS_COLOR = '#1DB954';

function decadeColor(decade: number, decades: ReadonlyArray<number>): string {
  const position = decades.indexOf(decade);
  if (position < 0 || decades.length <= 1) return DECADE_PALETTE[DECADE_PALETTE.length - 1];
  const scaled = Math.round((position / (decades.length - 1)) * (DECADE_PALETTE.length - 1));
  return DECADE_PALETTE[scaled];
}

function formatDecade(decade: number): string {
  return `${decade}s`;
}

function formatValue(value: number, digits = 2): string {
  return Number.isFinite(value) ? value.toFixed(digits) : '—';
}

function formatTooltipValue(value: unknown, digits: number): string {
  return typeof value === 'number' ? formatValue(value, digits) : String(value);
}

function isScatterPoint(value: unknown): value is ScatterPoint {
  if (value === null || typeof value !== 'object') return false;
  return 'x' in value && 'y' in value && 'decade' in value && 'name' in value;
}

function parseDecadeParam(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

interface DashboardProps {
  table: TrackTable;
  selectedDecades: ReadonlyArray<number>;
  onToggleDecade: (decade: number, selected: boolean) => void;
  onSelectAll: () => void;
  onClearDecades: () => void;
  filtersPending: boolean;
  scatterX: ScatterFeature;
  scatterY: ScatterFeature;
  onScatterXChange: (feature: ScatterFeature) => void;
  onScatterYChange: (feature: ScatterFeature) => void;
}

const Dashboard: React.FC<DashboardProps> = ({
  table,
  selectedDecades,
  onToggleDecade,
  onSelectAll,
  onClearDecades,
  filtersPending,
  scatterX,
  scatterY,
  onScatterXChange,
  onScatterYChange
}) => {
  const params = useParams<{ decade?: string }>();
  const navigate = useNavigate();
  const decades = availableDecades(table);

  const filtered = useMemo(() => filterByDecades(table, selectedDecades), [table, selectedDecades]);
  const focusDecade = resolveFocusDecade(parseDecadeParam(params.decade), filtered.decades);

  const trendRows = useMemo(
    () =>
      yearlyMeans(filtered, TREND_FEATURES).map((row) => ({
        year: row.year,
        ...row.means
      })),
    [filtered]
  );

  const radarPoints = useMemo(
    () => (focusDecade === null ? [] : fingerprint(filtered, focusDecade, FINGERPRINT_FEATURES)),
    [filtered, focusDecade]
  );

  const songs = useMemo(
    () => (focusDecade === null ? [] : topSongs(filtered, focusDecade)),
    [filtered, focusDecade]
  );

  const scatterSeries = useMemo(() => {
    const points = scatterPoints(sampleTracks(filtered), scatterX, scatterY);
    return filtered.decades.map((decade) => ({
      decade,
      points: points.filter((point) => point.decade === decade)
    }));
  }, [filtered, scatterX, scatterY]);

  const emptyMessage = <p className="text-sm text-muted-foreground">No tracks match the selected decades.</p>;

  return (
    <>
      <Card>
        <CardHeader>
          <CardTitle>Decades</CardTitle>
          <CardDescription>Choose the decades to compare. Every chart below follows this selection.</CardDescription>
        </CardHeader>
        <CardContent>
          <div className="flex flex-wrap items-center gap-2" aria-busy={filtersPending}>
            {decades.map((decade) => (
              <Badge
                key={decade}
                pressed={selectedDecades.includes(decade)}
                onPressedChange={(pressed) => onToggleDecade(decade, pressed)}
              >
                {formatDecade(decade)}
              </Badge>
            ))}
            <Button variant="ghost" size="sm" onClick={onSelectAll}>
              Select all
            </Button>
            <Button variant="ghost" size="sm" onClick={onClearDecades} disabled={selectedDecades.length === 0}>
              Clear
            </Button>
          </div>
          <p className="mt-3 text-sm text-muted-foreground">
            Tracks in selection: {filtered.tracks.length.toLocaleString()}
          </p>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>Feature trends by year</CardTitle>
          <CardDescription>Yearly averages of the core audio features.</CardDescription>
        </CardHeader>
        <CardContent>
          {trendRows.length === 0 ? (
            emptyMessage
          ) : (
            <ResponsiveContainer width="100%" height={340}>
              <LineChart data={trendRows} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis dataKey="year" type="number" domain={['dataMin', 'dataMax']} allowDecimals={false} />
                <YAxis domain={[0, 1]} />
                <Tooltip formatter={(value) => formatTooltipValue(value, 3)} />
                <Legend />
                {TREND_FEATURES.map((feature) => (
                  <Line
                    key={feature}
                    type="monotone"
                    dataKey={feature}
                    stroke={TREND_COLORS[feature]}
                    dot={false}
                    strokeWidth={2}
                  />
                ))}
              </LineChart>
            </ResponsiveContainer>
          )}
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>Decade fingerprint &amp; top songs</CardTitle>
          <CardDescription>Mean features of one decade, scaled against each other.</CardDescription>
        </CardHeader>
        <CardContent>
          {focusDecade === null ? (
            emptyMessage
          ) : (
            <div className="grid gap-6 lg:grid-cols-3">
              <div className="space-y-4">
                <div className="space-y-2">
                  <label className="block text-sm font-medium" htmlFor="focus-decade">
                    Decade
                  </label>
                  <Select
                    id="focus-decade"
                    value={String(focusDecade)}
                    onChange={(event) => navigate(`/decades/${event.target.value}`)}
                  >
                    {filtered.decades.map((decade) => (
                      <option key={decade} value={decade}>
                        {formatDecade(decade)}
                      </option>
                    ))}
                  </Select>
                </div>
                <ResponsiveContainer width="100%" height={300}>
                  <RadarChart data={[...radarPoints]} outerRadius="75%">
                    <PolarGrid />
                    <PolarAngleAxis dataKey="feature" />
                    <PolarRadiusAxis domain={[0, 1]} tickCount={5} />
                    <Radar
                      name={formatDecade(focusDecade)}
                      dataKey="value"
                      stroke={FOCUS_COLOR}
                      fill={FOCUS_COLOR}
                      fillOpacity={0.4}
                    />
                    <Tooltip formatter={(value) => formatTooltipValue(value, 2)} />
                  </RadarChart>
                </ResponsiveContainer>
              </div>
              <div className="lg:col-span-2">
                <h3 className="mb-3 text-base font-semibold">Top {songs.length} songs of the {formatDecade(focusDecade)}</h3>
                <ol className="space-y-2" aria-label={`Top songs of the ${formatDecade(focusDecade)}`}>
                  {songs.map((song) => (
                    <li key={song.track.index} className="flex items-baseline gap-3 text-sm">
                      <span className="w-5 text-right font-mono text-muted-foreground">{song.rank}</span>
                      <span>
                        <strong>{song.track.name}</strong> by <em>{song.artistsDisplay}</em>
                        <span className="text-muted-foreground"> (popularity: {song.track.popularity})</span>
                      </span>
                    </li>
                  ))}
                </ol>
              </div>
            </div>
          )}
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>{describeScatter(scatterX, scatterY)}</CardTitle>
          <CardDescription>Pick two features to see how they move together.</CardDescription>
        </CardHeader>
        <CardContent>
          <div className="mb-4 grid gap-4 sm:grid-cols-2">
            <div className="space-y-2">
              <label className="block text-sm font-medium" htmlFor="scatter-x">
                X axis
              </label>
              <Select
                id="scatter-x"
                value={scatterX}
                onChange={(event) => {
                  if (isScatterFeature(event.target.value)) onScatterXChange(event.target.value);
                }}
              >
                {SCATTER_FEATURES.map((feature) => (
                  <option key={feature} value={feature}>
                    {feature}
                  </option>
                ))}
              </Select>
            </div>
            <div className="space-y-2">
              <label className="block text-sm font-medium" htmlFor="scatter-y">
                Y axis
              </label>
              <Select
                id="scatter-y"
                value={scatterY}
                onChange={(event) => {
                  if (isScatterFeature(event.target.value)) onScatterYChange(event.target.value);
                }}
              >
                {SCATTER_FEATURES.map((feature) => (
                  <option key={feature} value={feature}>
                    {feature}
                  </option>
                ))}
              </Select>
            </div>
          </div>
          {filtered.tracks.length === 0 ? (
            emptyMessage
          ) : (
            <ResponsiveContainer width="100%" height={420}>
              <ScatterChart margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis type="number" dataKey="x" name={scatterX} domain={['auto', 'auto']} />
                <YAxis type="number" dataKey="y" name={scatterY} domain={['auto', 'auto']} />
                <Tooltip
                  cursor={{ strokeDasharray: '3 3' }}
                  content={({ active, payload }) => {
                    const point = payload?.[0]?.payload;
                    if (!active || !isScatterPoint(point)) return null;
                    return (
                      <div className="rounded-md border bg-background p-2 text-xs shadow-sm">
                        <p className="font-semibold">{point.name}</p>
                        <p>
                          {scatterX}: {formatValue(point.x)}
                        </p>
                        <p>
                          {scatterY}: {formatValue(point.y)}
                        </p>
                        <p>decade: {formatDecade(point.decade)}</p>
                      </div>
                    );
                  }}
                />
                <Legend />
                {scatterSeries.map((series) => (
                  <Scatter
                    key={series.decade}
                    name={formatDecade(series.decade)}
                    data={[...series.points]}
                    fill={decadeColor(series.decade, decades)}
                    fillOpacity={0.7}
                  />
                ))}
              </ScatterChart>
            </ResponsiveContainer>
          )}
        </CardContent>
      </Card>
    </>
  );
};

interface AppProps {
  loader: TrackLoader;
  datasetUrl: string;
}

export default function App({ loader, datasetUrl }: AppProps) {
  const [status, setStatus] = useState<Status>('loading');
  const [error, setError] = useState<string | null>(null);
  const [table, setTable] = useState<TrackTable | null>(null);
  const [selectedDecades, setSelectedDecades] = useState<ReadonlyArray<number>>([]);
  const [scatterX, setScatterX] = useState<ScatterFeature>(DEFAULT_SCATTER_X);
  const [scatterY, setScatterY] = useState<ScatterFeature>(DEFAULT_SCATTER_Y);
  const [filtersPending, startFilterTransition] = useTransition();
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    let cancelled = false;
    async function hydrate() {
      setStatus('loading');
      setError(null);
      try {
        const loaded = await loader.load(datasetUrl);
        if (cancelled) return;
        setTable(loaded);
        setSelectedDecades(availableDecades(loaded));
        setStatus('ready');
      } catch (err) {
        console.error(err);
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
        setStatus('error');
      }
    }
    void hydrate();
    return () => {
      cancelled = true;
    };
  }, [loader, datasetUrl, attempt]);

  const handleToggleDecade = useCallback(
    (decade: number, selected: boolean) => {
      startFilterTransition(() => {
        setSelectedDecades((current) => {
          const next = selected ? [...current, decade] : current.filter((value) => value !== decade);
          return Array.from(new Set(next)).sort((a, b) => a - b);
        });
      });
    },
    [startFilterTransition]
  );

  const handleSelectAll = useCallback(() => {
    if (!table) return;
    startFilterTransition(() => {
      setSelectedDecades(availableDecades(table));
    });
  }, [table, startFilterTransition]);

  const handleClearDecades = useCallback(() => {
    startFilterTransition(() => {
      setSelectedDecades([]);
    });
  }, [startFilterTransition]);

  return (
    <div className="min-h-screen bg-muted/30">
      <header className="border-b bg-background">
        <div className="mx-auto flex max-w-6xl flex-col gap-3 px-6 py-6 sm:flex-row sm:items-center sm:justify-between">
          <div>
            <h1 className="flex items-center gap-2 text-2xl font-semibold">
              <Music className="h-6 w-6 text-primary" aria-hidden="true" />
              <Link
                to="/"
                className="hover:text-primary focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring focus-visible:ring-offset-2 focus-visible:ring-offset-background"
              >
                Decades of Hits
              </Link>
            </h1>
            <p className="text-sm text-muted-foreground">
              How danceability, energy, mood and sound of popular tracks changed from the 1960s on.
            </p>
          </div>
          <div className="flex flex-wrap gap-2">
            {status === 'loading' ? (
              <Button variant="outline" disabled>
                <Loader2 className="h-4 w-4 animate-spin" />
                Loading tracks
              </Button>
            ) : null}
            {status === 'error' ? (
              <Button onClick={() => setAttempt((value) => value + 1)}>
                <RefreshCw className="h-4 w-4" />
                Retry
              </Button>
            ) : null}
          </div>
        </div>
        {error ? (
          <div className="mx-auto max-w-6xl px-6 pb-4">
            <p className="text-sm text-destructive">{error}</p>
          </div>
        ) : null}
      </header>

      <main className="mx-auto flex max-w-6xl flex-col gap-6 px-6 py-8">
        {table ? (
          <Routes>
            {['/', '/decades/:decade'].map((path) => (
              <Route
                key={path}
                path={path}
                element={
                  <Dashboard
                    table={table}
                    selectedDecades={selectedDecades}
                    onToggleDecade={handleToggleDecade}
                    onSelectAll={handleSelectAll}
                    onClearDecades={handleClearDecades}
                    filtersPending={filtersPending}
                    scatterX={scatterX}
                    scatterY={scatterY}
                    onScatterXChange={setScatterX}
                    onScatterYChange={setScatterY}
                  />
                }
              />
            ))}
            <Route
              path="*"
              element={
                <Card>
                  <CardHeader>
                    <CardTitle>Not Found</CardTitle>
                  </CardHeader>
                  <CardContent>
                    <Button variant="outline" asChild>
                      <Link to="/">
                        <ArrowLeft className="h-4 w-4" />
                        Back to the dashboard
                      </Link>
                    </Button>
                  </CardContent>
                </Card>
              }
            />
          </Routes>
        ) : status === 'loading' ? (
          <p className="text-sm text-muted-foreground">Loading the track dataset…</p>
        ) : null}
      </main>
    </div>
  );
}
