import React, { useCallback } from 'react';
import { useDropzone } from 'react-dropzone';
import { UploadCloud, FileVideo } from 'lucide-react';

interface DropZoneProps {
  file: File | null;
  onFileSelect: (file: File) => void;
  disabled: boolean;
}

const formatSize = (bytes: number) => `${(bytes / (1024 * 1024)).toFixed(1)} MB`;

export const DropZone: React.FC<DropZoneProps> = ({ file, onFileSelect, disabled }) => {
  const onDrop = useCallback((acceptedFiles: File[]) => {
    const [first] = acceptedFiles;
    if (first) onFileSelect(first);
  }, [onFileSelect]);

  const { getRootProps, getInputProps, isDragActive } = useDropzone({
    onDrop,
    accept: {
      'video/*': ['.mp4', '.mov', '.mkv', '.webm', '.avi']
    },
    maxFiles: 1,
    disabled
  });

  return (
    <div
      {...getRootProps()}
      className={`border-2 border-dashed rounded-xl p-10 text-center cursor-pointer transition-colors duration-200
      ${isDragActive ? 'border-blue-500 bg-blue-50' : 'border-slate-300 hover:border-slate-400 hover:bg-slate-50'}
      ${disabled ? 'opacity-50 cursor-not-allowed' : ''}
      `}
    >
      <input {...getInputProps()} />
      <div className="flex flex-col items-center justify-center space-y-4">
        <div className="p-4 bg-white rounded-full shadow-sm">
          {file || isDragActive ? (
            <FileVideo className="w-8 h-8 text-blue-500" />
          ) : (
            <UploadCloud className="w-8 h-8 text-slate-500" />
          )}
        </div>
        {file ? (
          <div>
            <p className="text-lg font-medium text-slate-700 truncate max-w-md">{file.name}</p>
            <p className="text-sm text-slate-500 mt-1">{formatSize(file.size)} · click or drop to replace</p>
          </div>
        ) : (
          <div>
            <p className="text-lg font-medium text-slate-700">
              {isDragActive ? 'Drop the video here' : 'Upload a video'}
            </p>
            <p className="text-sm text-slate-500 mt-1">
              Drag & drop or click to browse (MP4, MOV, MKV, WEBM)
            </p>
          </div>
        )}
      </div>
    </div>
  );
};
