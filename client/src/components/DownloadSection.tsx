import React from 'react';
import { JobResult } from '../types.js';
import { getFullUrl } from '../utils.js';
import { FileDown, Subtitles } from 'lucide-react';

interface DownloadSectionProps {
  result: JobResult;
}

export const DownloadSection: React.FC<DownloadSectionProps> = ({ result }) => {
  const srtUrl = result.subtitlesUrl.replace(/\.vtt$/, '.srt');

  return (
    <div className="mt-8 grid grid-cols-1 md:grid-cols-2 gap-4">
      <a 
        href={getFullUrl(result.subtitlesUrl)} 
        target="_blank" 
        download
        className="flex items-center justify-center space-x-2 p-4 bg-white border border-slate-200 rounded-xl hover:bg-slate-50 hover:border-slate-300 transition-all shadow-sm group"
      >
        <div className="p-2 bg-purple-100 rounded-lg group-hover:bg-purple-200 transition-colors">
          <Subtitles className="w-6 h-6 text-purple-600" />
        </div>
        <div className="text-left">
          <div className="font-semibold text-slate-800">Download VTT</div>
          <div className="text-xs text-slate-500">WebVTT track for web players</div>
        </div>
      </a>

      <a 
        href={getFullUrl(srtUrl)} 
        target="_blank" 
        download
        className="flex items-center justify-center space-x-2 p-4 bg-white border border-slate-200 rounded-xl hover:bg-slate-50 hover:border-slate-300 transition-all shadow-sm group"
      >
        <div className="p-2 bg-blue-100 rounded-lg group-hover:bg-blue-200 transition-colors">
          <FileDown className="w-6 h-6 text-blue-600" />
        </div>
        <div className="text-left">
          <div className="font-semibold text-slate-800">Download SRT</div>
          <div className="text-xs text-slate-500">SubRip file for desktop players</div>
        </div>
      </a>
    </div>
  );
};
