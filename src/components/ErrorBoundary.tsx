// Keeps a throwing tooltip content component from taking the host page down.
// React error boundaries must be class components (hooks can't catch render errors)

import { Component, ErrorInfo, ReactNode } from 'react';

interface Props {
  children: ReactNode;
  // Optional name for identifying which boundary caught the error
  name?: string;
  // Rendered instead of the children after an error; nothing by default
  fallback?: ReactNode;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface State {
  hasError: boolean;
  error: Error | null;
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    const boundaryName = this.props.name || 'Unknown';
    console.error(`[ErrorBoundary:${boundaryName}] Caught error:`, error);
    console.error(`[ErrorBoundary:${boundaryName}] Component stack:`, errorInfo.componentStack);

    if (this.props.onError) {
      this.props.onError(error, errorInfo);
    }
  }

  render(): ReactNode {
    if (this.state.hasError) {
      return this.props.fallback ?? null;
    }
    return this.props.children;
  }
}

export default ErrorBoundary;
