import React, { useState, useEffect, useRef } from 'react';
import axios from 'axios';
import { DropZone } from './components/DropZone.js';
import { StatusCard } from './components/StatusCard.js';
import { PlayerPanel } from './components/PlayerPanel.js';
import { PreviewPanel } from './components/PreviewPanel.js';
import { DownloadSection } from './components/DownloadSection.js';
import { JobStatus, LanguageCode, UploadResponse } from './types.js';
import { API_BASE, LANGUAGES } from './constants.js';
import { AlertCircle, Clapperboard, Globe2, Languages, RefreshCw, Sparkles } from 'lucide-react';

const requestError = (err: unknown, fallback: string): string => {
  if (axios.isAxiosError<{ error?: string }>(err)) {
    return err.response?.data?.error || err.message || fallback;
  }
  return err instanceof Error ? err.message : fallback;
};

interface LanguageSelectProps {
  label: string;
  value: LanguageCode;
  onChange: (code: LanguageCode) => void;
  disabled: boolean;
}

const LanguageSelect: React.FC<LanguageSelectProps> = ({ label, value, onChange, disabled }) => (
  <div className="space-y-2">
    <label className="text-sm font-bold text-slate-500 uppercase flex items-center gap-2">
      <Globe2 className="w-4 h-4" /> {label}
    </label>
    <select
      value={value}
      disabled={disabled}
      onChange={(e) => {
        const next = LANGUAGES.find((lang) => lang.code === e.target.value);
        if (next) onChange(next.code);
      }}
      className="w-full p-3 text-sm border border-slate-200 rounded-lg bg-white focus:ring-2 focus:ring-blue-500 outline-none"
    >
      {LANGUAGES.map((lang) => (
        <option key={lang.code} value={lang.code}>{lang.label} ({lang.code})</option>
      ))}
    </select>
  </div>
);

function App() {
  const [file, setFile] = useState<File | null>(null);
  const [sourceLang, setSourceLang] = useState<LanguageCode>('en');
  const [targetLang, setTargetLang] = useState<LanguageCode>('fr');
  const [isStarting, setIsStarting] = useState(false);

  const [jobId, setJobId] = useState<string | null>(null);
  const [jobStatus, setJobStatus] = useState<JobStatus | null>(null);
  const [error, setError] = useState<string | null>(null);
  const pollIntervalRef = useRef<number | null>(null);

  const isRunning = jobStatus !== null && (jobStatus.status === 'queued' || jobStatus.status === 'processing');
  const busy = isStarting || isRunning;

  const stopPolling = () => {
    if (pollIntervalRef.current) {
      window.clearInterval(pollIntervalRef.current);
      pollIntervalRef.current = null;
    }
  };

  const handleFileSelect = (selectedFile: File) => {
    setFile(selectedFile);
    setError(null);
  };

  const handleStartGeneration = async () => {
    if (!file) return;
    setIsStarting(true);
    setError(null);
    setJobStatus(null);

    const formData = new FormData();
    formData.append('file', file);
    formData.append('sourceLang', sourceLang);
    formData.append('targetLang', targetLang);

    try {
      const res = await axios.post<UploadResponse>(`${API_BASE}/jobs`, formData);
      setJobId(res.data.jobId);
    } catch (err) {
      console.error(err);
      setError(requestError(err, 'Failed to upload file.'));
    } finally {
      setIsStarting(false);
    }
  };

  useEffect(() => {
    if (!jobId) return;

    const pollStatus = async () => {
      try {
        const res = await axios.get<JobStatus>(`${API_BASE}/jobs/${jobId}`);
        setJobStatus(res.data);
        if (res.data.status === 'done' || res.data.status === 'error') {
          stopPolling();
        }
      } catch (err) {
        console.error('Polling error', err);
        setError(requestError(err, 'Lost track of the job.'));
        stopPolling();
      }
    };

    pollIntervalRef.current = window.setInterval(() => {
      void pollStatus();
    }, 1000);
    return stopPolling;
  }, [jobId]);

  const result = jobStatus?.status === 'done' ? jobStatus.result : undefined;

  return (
    <div className="min-h-screen bg-slate-50 py-12 px-4 sm:px-6 lg:px-8 font-sans">
      <div className="max-w-4xl mx-auto">
        {/* Header */}
        <div className="text-center mb-8">
          <div className="inline-flex items-center justify-center p-3 bg-blue-600 rounded-2xl shadow-lg mb-4">
            <Clapperboard className="w-8 h-8 text-white" />
          </div>
          <h1 className="text-4xl font-extrabold text-slate-900 tracking-tight mb-2">
            Video Translator + Inline Subtitle Player
          </h1>
          <p className="text-lg text-slate-600 max-w-xl mx-auto">
            Transcribe the speech in a video, translate it, and watch it with subtitles right here.
          </p>
        </div>

        <div className="bg-white rounded-2xl shadow-xl border border-slate-100 p-6 md:p-8">
          {error && (
            <div className="mb-6 p-4 bg-red-50 border border-red-200 rounded-lg flex items-start space-x-3">
              <AlertCircle className="w-5 h-5 text-red-500 mt-0.5" />
              <div className="text-sm text-red-700">{error}</div>
              <button onClick={() => setError(null)} className="ml-auto text-red-500 font-bold hover:text-red-700">&times;</button>
            </div>
          )}

          <div className="space-y-8">
            {/* Step 1: File Selection */}
            <div>
              <div className="flex items-center gap-2 mb-4">
                <div className="w-6 h-6 rounded-full bg-blue-100 text-blue-600 flex items-center justify-center text-xs font-bold">1</div>
                <h3 className="font-semibold text-slate-800">Select Video</h3>
              </div>
              <DropZone file={file} onFileSelect={handleFileSelect} disabled={busy} />
            </div>

            {/* Step 2: Languages */}
            <div className={file ? 'opacity-100' : 'opacity-40 pointer-events-none'}>
              <div className="flex items-center gap-2 mb-4">
                <div className="w-6 h-6 rounded-full bg-blue-100 text-blue-600 flex items-center justify-center text-xs font-bold">2</div>
                <h3 className="font-semibold text-slate-800 flex items-center gap-2">
                  <Languages className="w-4 h-4" /> Choose Languages
                </h3>
              </div>
              <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                <LanguageSelect label="Source Language" value={sourceLang} onChange={setSourceLang} disabled={busy} />
                <LanguageSelect label="Target Language" value={targetLang} onChange={setTargetLang} disabled={busy} />
              </div>
            </div>

            <button
              onClick={() => void handleStartGeneration()}
              disabled={!file || busy}
              className="w-full py-4 bg-blue-600 hover:bg-blue-700 text-white rounded-xl font-bold text-lg shadow-lg flex items-center justify-center gap-3 disabled:opacity-50 disabled:cursor-not-allowed transition-all transform active:scale-95"
            >
              {busy ? <RefreshCw className="w-6 h-6 animate-spin" /> : <Sparkles className="w-6 h-6" />}
              {busy ? 'Processing...' : 'Generate Subtitled Player'}
            </button>
          </div>

          {jobStatus && <StatusCard job={jobStatus} />}

          {result && (
            <>
              <PlayerPanel markup={result.playerHtml} />
              <DownloadSection result={result} />
              <PreviewPanel cues={result.cues} />
            </>
          )}
        </div>
      </div>
    </div>
  );
}

export default App;
