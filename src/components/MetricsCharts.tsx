// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { Bar, BarChart, Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { describeActivitySlice, type ActivitySlice, type MetricsBar } from '../services/overviewMetrics'

const tooltipStyle = { fontSize: '12px', borderRadius: '8px', background: 'rgba(10,10,10,0.9)', border: '1px solid #333' }

const emptyState = (
  <div style={{ height: 260, display: 'flex', alignItems: 'center', justifyContent: 'center', color: 'rgba(255,255,255,0.6)' }}>
    Loading chart data...
  </div>
)

export function TodayMetricsChart({ series }: { series: ReadonlyArray<MetricsBar> }): JSX.Element {
  if (series.length === 0) return emptyState
  return (
    <ResponsiveContainer width="100%" height={260}>
      <BarChart data={[...series]}>
        <XAxis dataKey="category" stroke="#aaa" fontSize={12} />
        <YAxis allowDecimals={false} stroke="#aaa" fontSize={12} />
        <Tooltip contentStyle={tooltipStyle} cursor={{ fill: 'rgba(255,255,255,0.05)' }} />
        <Bar dataKey="count" radius={[4, 4, 0, 0]}>
          {series.map((row) => (
            <Cell key={row.category} fill={row.color} />
          ))}
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  )
}

export function ActivityPieChart({ slices }: { slices: ReadonlyArray<ActivitySlice> }): JSX.Element {
  if (slices.length === 0) return emptyState
  const byLabel = new Map(slices.map((slice) => [slice.label, slice]))
  return (
    <ResponsiveContainer width="100%" height={260}>
      <PieChart>
        <Pie
          data={[...slices]}
          dataKey="value"
          nameKey="label"
          cx="50%"
          cy="50%"
          outerRadius={90}
          innerRadius={45}
          labelLine={false}
        >
          {slices.map((slice) => (
            <Cell key={slice.code} fill={slice.color} />
          ))}
        </Pie>
        <Tooltip
          formatter={(value, name) => {
            const slice = byLabel.get(String(name))
            return [slice ? describeActivitySlice(slice) : `${value} items`, name]
          }}
          contentStyle={tooltipStyle}
        />
        <Legend layout="vertical" verticalAlign="middle" align="right" wrapperStyle={{ fontSize: '11px' }} />
      </PieChart>
    </ResponsiveContainer>
  )
}
