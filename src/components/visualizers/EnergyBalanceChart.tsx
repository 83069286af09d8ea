import { PieChart, Pie, Cell, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { CombustionResultV1 } from '../../contracts/CombustionResultV1';
import { buildEnergyBalanceSlices } from './chartSeries';

interface Props {
  result: CombustionResultV1;
}

/** Useful energy against chimney losses (MW). */
export default function EnergyBalanceChart({ result }: Props) {
  const slices = buildEnergyBalanceSlices(result);

  return (
    <ResponsiveContainer width="100%" height={260}>
      <PieChart>
        <Pie data={slices} dataKey="value" nameKey="name" innerRadius="45%" outerRadius="80%">
          {slices.map(s => (
            <Cell key={s.id} fill={s.color} />
          ))}
        </Pie>
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <Legend wrapperStyle={{ fontSize: '0.8rem' }} />
      </PieChart>
    </ResponsiveContainer>
  );
}
