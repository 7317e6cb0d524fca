import { useRef, useState, type ChangeEvent, type DragEvent } from "react";
import { readUploadFile, type UploadSource } from "../../lib/import/parseFile";

type UploadPanelProps = {
  busy: boolean;
  onUpload: (source: UploadSource, name: string) => Promise<void>;
};

export const UploadPanel = ({ busy, onUpload }: UploadPanelProps) => {
  const inputRef = useRef<HTMLInputElement>(null);
  const [file, setFile] = useState<File | null>(null);
  const [name, setName] = useState("");
  const [dragging, setDragging] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const pickFile = (next: File | null) => {
    setFile(next);
    setError(null);
  };

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    pickFile(event.target.files?.[0] ?? null);
  };

  const handleDrop = (event: DragEvent<HTMLDivElement>) => {
    event.preventDefault();
    setDragging(false);
    pickFile(event.dataTransfer.files[0] ?? null);
  };

  const handleSubmit = async () => {
    if (!file) {
      setError("Choose a CSV file first.");
      return;
    }
    try {
      const source = await readUploadFile(file);
      await onUpload(source, name.trim());
      setFile(null);
      setName("");
      if (inputRef.current) {
        inputRef.current.value = "";
      }
    } catch (uploadError) {
      setError(uploadError instanceof Error ? uploadError.message : "Upload failed.");
    }
  };

  return (
    <section className="upload">
      <h2>Upload equipment data</h2>
      <div
        className={`dropzone ${dragging ? "dragging" : ""}`}
        onDragOver={(event) => {
          event.preventDefault();
          setDragging(true);
        }}
        onDragLeave={() => setDragging(false)}
        onDrop={handleDrop}
      >
        <p>Drop a .csv or .xlsx file here, or</p>
        <label className="file-label">
          Browse
          <input
            ref={inputRef}
            type="file"
            accept=".csv,.xlsx"
            aria-label="Equipment file"
            onChange={handleChange}
          />
        </label>
        {file && <p className="meta">Selected: {file.name}</p>}
      </div>
      <label className="field">
        Dataset name (optional)
        <input type="text" value={name} onChange={(event) => setName(event.target.value)} />
      </label>
      <button type="button" onClick={() => void handleSubmit()} disabled={busy || !file}>
        {busy ? "Uploading..." : "Upload"}
      </button>
      {error && (
        <p className="error" role="alert">
          {error}
        </p>
      )}
    </section>
  );
};
