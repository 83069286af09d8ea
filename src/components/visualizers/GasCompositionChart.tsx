import { BarChart, Bar, Cell, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { CombustionResultV1 } from '../../contracts/CombustionResultV1';
import { buildGasCompositionSlices } from './chartSeries';

interface Props {
  result: CombustionResultV1;
}

export default function GasCompositionChart({ result }: Props) {
  const slices = buildGasCompositionSlices(result);

  return (
    <ResponsiveContainer width="100%" height={240}>
      <BarChart data={slices} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="name" tick={{ fontSize: 11 }} />
        <YAxis
          domain={[0, 100]}
          tick={{ fontSize: 10 }}
          label={{ value: '% by volume', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <Bar dataKey="value" name="Volume fraction (%)">
          {slices.map(s => (
            <Cell key={s.id} fill={s.color} />
          ))}
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  );
}
