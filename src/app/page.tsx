'use client';

import React, { useState } from 'react';
import { BottomDrawer, useBottomDrawerController } from '@/components/bottom-drawer';

const STOPS = [0.15, 0.5, 0.9];

export default function DemoPage() {
  const drawer = useBottomDrawerController();
  const [height, setHeight] = useState({ px: 0, fraction: 0 });
  const [lastStop, setLastStop] = useState<number | null>(null);

  return (
    <main className="demo">
      <div className="demo__controls">
        <button type="button" onClick={() => drawer.collapse({ duration: 300, curve: 'easeOut' })}>
          Collapse
        </button>
        <button type="button" onClick={() => drawer.expand({ duration: 300, curve: 'easeOut' })}>
          Expand
        </button>
        <button type="button" onClick={() => drawer.scrollTo(0, { duration: 400, curve: 'fastOutSlowIn' })}>
          Back to top
        </button>
        <span>
          {Math.round(height.px)}px ({Math.round(height.fraction * 100)}%)
          {lastStop !== null && ` · stop ${lastStop}`}
        </span>
      </div>

      <BottomDrawer
        controller={drawer}
        stops={STOPS}
        initialStopIndex={1}
        forceResizeStartDistance={32}
        borderRadius="16px 16px 0 0"
        shadow="0 -4px 24px rgba(0, 0, 0, 0.12)"
        listPadding="0 0 24px"
        header={<h2 style={{ margin: 0, padding: '8px 20px' }}>Nearby</h2>}
        itemBuilder={index => <div className="demo__row">Item {index + 1}</div>}
        itemCount={60}
        onHeightChanged={(px, fraction) => setHeight({ px, fraction })}
        onSnapEnd={setLastStop}
        aria-label="Nearby places"
      />
    </main>
  );
}
