import React, { useState } from "react";
import { formatSummary } from "../simulation/summary";
import type { PlaybackFrame } from "../simulation/timeline";
import type { DerivedSummary } from "../types/fire-types";
import { PROTECTION_STRATEGIES } from "../constants";

interface Props {
  summary: DerivedSummary;
  firstContact: PlaybackFrame | null;
}

export const InfoPanel: React.FC<Props> = ({ summary, firstContact }) => {
  const [checked, setChecked] = useState<boolean[]>(() => PROTECTION_STRATEGIES.map(() => false));
  const text = formatSummary(summary);

  return (
    <div className="info-panel">
      <h3>Fire Information</h3>
      <div className="info">Distance from fire origin to target: {text.distance}</div>
      <div className="info">Estimated time to reach target: {text.arrival} at current conditions</div>
      <div className={`risk risk-${summary.riskLevel.toLowerCase()}`}>Current Risk Assessment: {text.risk}</div>
      <div className="contact">
        {firstContact
          ? `Protected zone reached on Day ${firstContact.day}, Hour ${firstContact.hour}`
          : "Fire does not reach the protected zone"}
      </div>
      <h3>Protection Strategies</h3>
      {PROTECTION_STRATEGIES.map((strategy, i) => (
        <label key={strategy} className="strategy">
          <input type="checkbox" checked={checked[i]}
            onChange={e => setChecked(prev => prev.map((c, j) => (j === i ? e.target.checked : c)))} />
          {strategy}
        </label>
      ))}
    </div>
  );
};
