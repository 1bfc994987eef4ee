// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import ReactDOM from 'react-dom/client'
import AppShell from './components/AppShell'
import { describeError, logError } from './state/logStore'

type BoundaryProps = { children?: React.ReactNode }
type BoundaryState = { error: Error | null }

class ErrorBoundary extends React.Component<BoundaryProps, BoundaryState> {
  state: BoundaryState = { error: null }

  static getDerivedStateFromError(error: Error): BoundaryState {
    return { error }
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    logError('app', 'Unhandled render error', { ...describeError(error), componentStack: errorInfo.componentStack })
  }

  render() {
    if (this.state.error) {
      return (
        <div style={{ padding: 20, background: '#000', color: '#fff', fontFamily: 'monospace', height: '100vh' }}>
          <h1>Command Center Error</h1>
          <pre style={{ color: '#ff6b6b', whiteSpace: 'pre-wrap' }}>{String(this.state.error)}</pre>
        </div>
      )
    }
    return this.props.children
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Root element #root not found')

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <ErrorBoundary>
      <AppShell />
    </ErrorBoundary>
  </React.StrictMode>
)
