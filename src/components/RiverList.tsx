import { GageSummary, RiverSummary } from '@/types/gage';
import { formatValue, isUnknownReading } from '@/lib/timeSeriesStore';

function LatestValue({ gage }: { gage: GageSummary }) {
  if (isUnknownReading(gage.latest)) {
    return <span className="reading unknown">N/A</span>;
  }

  return (
    <span className="reading">
      {formatValue(gage.latest.value, gage.units)} {gage.units}
      <span className="reading-time"> at {gage.latest.time.slice(0, 5)} on {gage.latest.date}</span>
    </span>
  );
}

function GageCard({ gage }: { gage: GageSummary }) {
  return (
    <li className="gage">
      <div className="gage-heading">
        {gage.pageUrl ? (
          <a href={gage.pageUrl} target="_blank" rel="noreferrer">{gage.location}</a>
        ) : (
          <span>{gage.location}</span>
        )}
        <LatestValue gage={gage} />
        {gage.ageLabel && gage.ageLabel !== 'N/A' && (
          <span className="stale">({gage.ageLabel})</span>
        )}
      </div>
      <img
        src={gage.imageUrl}
        alt={`Graph of ${gage.river} ${gage.location}`}
        width={576}
        height={384}
        loading="lazy"
      />
    </li>
  );
}

export default function RiverList({ rivers }: { rivers: RiverSummary[] }) {
  if (rivers.length === 0) {
    return <p className="empty">No gages configured for this region.</p>;
  }

  return (
    <div className="rivers">
      {rivers.map(river => (
        <section key={river.river} className="river">
          <h2>{river.river}</h2>
          <ul>
            {river.gages.map(gage => (
              <GageCard key={`${gage.gageType}-${gage.gageId}`} gage={gage} />
            ))}
          </ul>
        </section>
      ))}
    </div>
  );
}
