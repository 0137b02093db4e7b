import React from 'react';
import { Cue } from '../types.js';
import { formatCueTime } from '../utils.js';

interface PreviewPanelProps {
  cues: Cue[];
}

export const PreviewPanel: React.FC<PreviewPanelProps> = ({ cues }) => {
  if (cues.length === 0) {
    return <p className="mt-8 text-sm text-slate-500">No speech was detected in this video.</p>;
  }

  return (
    <div className="mt-8">
      <h3 className="text-lg font-semibold text-slate-800 mb-4">Subtitle Cues</h3>
      <div className="bg-slate-900 rounded-lg p-4 overflow-y-auto max-h-80 shadow-inner">
        <div className="space-y-4">
          {cues.map((cue, idx) => (
            <div key={idx} className="bg-slate-800/50 p-3 rounded border border-slate-700">
              <div className="text-xs text-slate-500 font-mono mb-2">
                {formatCueTime(cue.start)} {'-->'} {formatCueTime(cue.end)}
              </div>
              <div className="text-white font-medium text-lg leading-snug whitespace-pre-line">{cue.text}</div>
            </div>
          ))}
        </div>
      </div>
    </div>
  );
};
