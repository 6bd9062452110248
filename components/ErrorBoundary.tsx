import React from 'react';
import { FatalScreen } from './FatalScreen';

interface Props {
  children?: React.ReactNode;
  onReload?: () => void;
}

interface State {
  error: Error | null;
}

// Catches render and live-query failures (an unreadable garment table) below the app root
export class ErrorBoundary extends React.Component<Props, State> {
  public state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    console.error("Assistant crashed:", error, errorInfo.componentStack);
  }

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;

    return (
      <FatalScreen
        title="Oops!"
        summary="Something went wrong while loading the assistant."
        detail={error.message || 'Unknown error'}
        onRetry={this.props.onReload ?? (() => window.location.reload())}
      />
    );
  }
}
