import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { SensitivityReport } from '../../contracts/AnalysisV1';
import { buildSensitivitySeries } from './chartSeries';
import type { SensitivityPoint } from './chartSeries';

type PlottedChannel = Exclude<keyof SensitivityPoint, 'value'>;

const CHANNEL_STYLE: Record<PlottedChannel, { name: string; color: string }> = {
  temperatureC:    { name: 'Outlet temperature (°C)', color: '#e53e3e' },
  velocityMs:      { name: 'Gas velocity (m/s)',      color: '#3182ce' },
  pressureDropPaM: { name: 'Pressure drop (Pa/m)',    color: '#805ad5' },
  efficiencyPct:   { name: 'Efficiency (%)',          color: '#38a169' },
};

interface Props {
  report: SensitivityReport;
  channel: PlottedChannel;
}

export default function SensitivityCurveChart({ report, channel }: Props) {
  const data = buildSensitivitySeries(report);
  const style = CHANNEL_STYLE[channel];

  return (
    <ResponsiveContainer width="100%" height={280}>
      <LineChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="value"
          tick={{ fontSize: 10 }}
          label={{ value: `${report.label} (${report.unit})`, position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis tick={{ fontSize: 10 }} />
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        <ReferenceLine
          x={parseFloat(report.baseValue.toFixed(3))}
          stroke="#a0aec0"
          strokeDasharray="4 4"
          label={{ value: 'Base', fontSize: 10, fill: '#718096' }}
        />
        <Line
          type="monotone"
          dataKey={channel}
          name={style.name}
          stroke={style.color}
          strokeWidth={2.5}
          dot={false}
        />
      </LineChart>
    </ResponsiveContainer>
  );
}
