import React from "react";
import { Bar, BarChart, CartesianGrid, Cell, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import { ERROR_TYPE_COLORS } from "../../utils/chartData";
import type { ErrorTypeDatum } from "../../utils/chartData";

interface ErrorTypeChartProps {
  data: ErrorTypeDatum[];
  height?: number;
}

export const ErrorTypeChart: React.FC<ErrorTypeChartProps> = ({ data, height = 260 }) => {
  return (
    <figure className="rounded-xl bg-white p-4 shadow" aria-labelledby="error-type-chart-caption">
      <figcaption id="error-type-chart-caption" className="mb-2 font-semibold text-gray-900">
        Mistakes by error type
      </figcaption>
      <ResponsiveContainer width="100%" height={height}>
        <BarChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" stroke="#64748b" />
          <YAxis allowDecimals={false} stroke="#64748b" />
          <Tooltip />
          <Bar dataKey="count" name="Mistakes">
            {data.map((entry) => (
              <Cell key={entry.errorType} fill={ERROR_TYPE_COLORS[entry.errorType]} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
      <table className="sr-only">
        <caption>Mistakes by error type</caption>
        <tbody>
          {data.map((entry) => (
            <tr key={entry.errorType}>
              <th scope="row">{entry.label}</th>
              <td>{entry.count}</td>
              <td>{entry.percent}%</td>
            </tr>
          ))}
        </tbody>
      </table>
    </figure>
  );
};
