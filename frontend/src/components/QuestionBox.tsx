import { useState, type FormEvent } from "react";
import { Loader2, MessageCircleQuestion } from "lucide-react";
import { api } from "../lib/api";
import type { QuestionAnswer } from "../lib/types";
import { errorMessage } from "../lib/utils";

interface QuestionBoxProps {
  sessionId: string;
}

export function QuestionBox({ sessionId }: QuestionBoxProps) {
  const [question, setQuestion] = useState("");
  const [history, setHistory] = useState<QuestionAnswer[]>([]);
  const [loading, setLoading] = useState(false);
  const [apiError, setApiError] = useState<string | null>(null);

  async function submit(e: FormEvent) {
    e.preventDefault();
    const asked = question.trim();
    if (!asked) return;
    setApiError(null);
    setLoading(true);
    try {
      const { answer } = await api.askQuestion(sessionId, asked);
      setHistory((h) => [{ question: asked, answer }, ...h]);
      setQuestion("");
    } catch (err) {
      setApiError(errorMessage(err));
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="space-y-4">
      <form onSubmit={submit} className="space-y-3">
        <label className="text-sm font-medium text-slate-300 flex items-center gap-2">
          <MessageCircleQuestion className="w-4 h-4 text-slate-500" />
          Ask about this bill
        </label>
        <textarea
          value={question}
          onChange={(e) => setQuestion(e.target.value)}
          rows={3}
          maxLength={2000}
          placeholder="Who has to follow the new rules?"
          className="w-full bg-slate-800/60 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100 placeholder:text-slate-500 focus:outline-none focus:ring-2 focus:ring-brand-500/40 focus:border-brand-500 resize-y"
        />

        {apiError && (
          <div className="rounded-lg bg-red-900/30 border border-red-500/30 px-3 py-2 text-sm text-red-300">
            {apiError}
          </div>
        )}

        <button
          type="submit"
          disabled={loading || !question.trim()}
          className="w-full flex items-center justify-center gap-2 rounded-lg bg-brand-600 hover:bg-brand-500 disabled:opacity-50 disabled:cursor-not-allowed text-white font-semibold text-sm py-2.5 transition-colors"
        >
          {loading ? (
            <>
              <Loader2 className="w-4 h-4 animate-spin" />
              Reading the bill...
            </>
          ) : (
            "Ask"
          )}
        </button>
      </form>

      {history.length > 0 && (
        <ul className="space-y-3">
          {history.map((qa, i) => (
            <li key={i} className="rounded-lg bg-slate-800/40 border border-slate-700/60 px-3 py-2.5">
              <p className="text-xs font-semibold text-slate-400">{qa.question}</p>
              <p className="text-sm text-slate-200 mt-1 whitespace-pre-line">{qa.answer}</p>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
