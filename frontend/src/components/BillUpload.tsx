import { useCallback } from "react";
import { useDropzone } from "react-dropzone";
import { UploadCloud, FileText, FileWarning, Loader2, AlertTriangle, ScanLine } from "lucide-react";
import { cn, textCoverage } from "../lib/utils";

interface BillUploadProps {
  onUpload: (file: File) => Promise<void>;
  uploading: boolean;
  filename: string | null;
  pageCount: number;
  extractedPageCount: number;
  charCount: number;
  error: string | null;
}

export function BillUpload({
  onUpload,
  uploading,
  filename,
  pageCount,
  extractedPageCount,
  charCount,
  error,
}: BillUploadProps) {
  // Image-only scans come through with pages but no text layer
  const coverage = filename ? textCoverage(pageCount, extractedPageCount) : null;
  const noText = coverage === "none";
  const skippedPages = pageCount - extractedPageCount;

  const onDrop = useCallback(
    (accepted: File[]) => {
      const [file] = accepted;
      if (file) void onUpload(file);
    },
    [onUpload]
  );

  const { getRootProps, getInputProps, isDragActive } = useDropzone({
    onDrop,
    accept: { "application/pdf": [".pdf"] },
    maxFiles: 1,
    disabled: uploading,
  });

  return (
    <div className="space-y-3">
      <label className="text-sm font-medium text-slate-300">
        Bill PDF
      </label>

      <div
        {...getRootProps()}
        className={cn(
          "group relative flex flex-col items-center justify-center gap-3 rounded-xl border-2 border-dashed px-6 py-10 cursor-pointer transition-all duration-200",
          isDragActive
            ? "border-brand-500 bg-brand-900/20"
            : "border-slate-600 hover:border-slate-500 bg-slate-800/40 hover:bg-slate-800/60",
          uploading && "opacity-50 cursor-not-allowed"
        )}
      >
        <input {...getInputProps()} />

        {uploading ? (
          <>
            <Loader2 className="w-10 h-10 text-brand-500 animate-spin" />
            <p className="text-sm text-slate-300 font-medium">Extracting text…</p>
          </>
        ) : filename ? (
          <>
            {noText ? (
              <FileWarning className="w-10 h-10 text-amber-400" />
            ) : (
              <FileText className="w-10 h-10 text-brand-500" />
            )}
            <div className="text-center">
              <p className="text-sm font-medium text-slate-200">{filename}</p>
              <p className="text-xs text-slate-400 mt-1">
                {pageCount} page{pageCount === 1 ? "" : "s"} · {charCount.toLocaleString()} characters
                of bill text · drop a new PDF to replace
              </p>
            </div>
          </>
        ) : (
          <>
            <UploadCloud
              className={cn(
                "w-10 h-10 transition-colors",
                isDragActive ? "text-brand-400" : "text-slate-500 group-hover:text-slate-400"
              )}
            />
            <div className="text-center">
              <p className="text-sm font-medium text-slate-300">
                {isDragActive ? "Drop it here" : "Drop a Government / Parliamentary Bill PDF"}
              </p>
              <p className="text-xs text-slate-500 mt-1">
                or click to browse · text-based PDFs only, scans need OCR first
              </p>
            </div>
          </>
        )}
      </div>

      {noText && (
        <div className="flex items-start gap-2 rounded-lg bg-amber-900/20 border border-amber-500/30 px-3 py-2 text-sm text-amber-200">
          <ScanLine className="w-4 h-4 shrink-0 mt-0.5" />
          <span>
            None of the pages has selectable text, so this looks like a scanned
            bill. Run it through OCR and upload the result to analyse it.
          </span>
        </div>
      )}

      {coverage === "partial" && (
        <p className="flex items-center gap-1.5 text-xs text-amber-300/80">
          <AlertTriangle className="w-3.5 h-3.5" />
          {skippedPages} of {pageCount} pages had no readable text and were left out.
        </p>
      )}

      {error && (
        <div className="flex items-start gap-2 rounded-lg bg-red-900/30 border border-red-500/30 px-3 py-2 text-sm text-red-300">
          <AlertTriangle className="w-4 h-4 shrink-0 mt-0.5" />
          <span>{error}</span>
        </div>
      )}
    </div>
  );
}
