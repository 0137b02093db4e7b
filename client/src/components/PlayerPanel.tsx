import React from 'react';

interface PlayerPanelProps {
  markup: string;
}

// The markup comes from our own server and only carries data URIs
export const PlayerPanel: React.FC<PlayerPanelProps> = ({ markup }) => (
  <div className="mt-8 border-t border-slate-200 pt-6">
    <h3 className="text-lg font-semibold text-slate-800 mb-4">Preview with Subtitles</h3>
    <div className="flex justify-center" dangerouslySetInnerHTML={{ __html: markup }} />
  </div>
);
