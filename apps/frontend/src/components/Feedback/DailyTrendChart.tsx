import type { ErrorType } from "@language-tutor/shared/tutor";
import React from "react";
import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import { ERROR_TYPE_COLORS, formatErrorType } from "../../utils/chartData";
import type { TrendDatum } from "../../utils/chartData";

interface DailyTrendChartProps {
  data: TrendDatum[];
  errorTypes: ErrorType[];
  height?: number;
}

export const DailyTrendChart: React.FC<DailyTrendChartProps> = ({ data, errorTypes, height = 300 }) => {
  return (
    <figure className="rounded-xl bg-white p-4 shadow" aria-labelledby="trend-chart-caption">
      <figcaption id="trend-chart-caption" className="mb-2 font-semibold text-gray-900">
        Daily trend
      </figcaption>
      <ResponsiveContainer width="100%" height={height}>
        <LineChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" stroke="#64748b" />
          <YAxis allowDecimals={false} stroke="#64748b" />
          <Tooltip />
          <Legend />
          <Line type="monotone" dataKey="total" name="Total" stroke="#0b1240" strokeWidth={2} dot={false} />
          {errorTypes.map((errorType) => (
            <Line
              key={errorType}
              type="monotone"
              dataKey={errorType}
              name={formatErrorType(errorType)}
              stroke={ERROR_TYPE_COLORS[errorType]}
              dot={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </figure>
  );
};
