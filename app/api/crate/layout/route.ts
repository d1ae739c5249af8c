import { NextRequest, NextResponse } from 'next/server';

import {
  calculateCrateLayout,
  isCrateLayoutError,
  loadCrateConfig,
  renderCrateExpressions,
  type CrateLayoutConfig,
  type CrateLayoutErrorCode,
} from '@/lib/crate';

const STATUS_BY_CODE: Record<CrateLayoutErrorCode, number> = {
  invalid_input: 400,
  capacity_exceeded: 422,
  non_convergence: 500,
};

export async function POST(req: NextRequest) {
  const body: unknown = await req.json().catch(() => null);
  if (body === null || typeof body !== 'object') {
    return NextResponse.json({ error: 'Invalid payload', details: 'Expected a JSON object' }, { status: 400 });
  }

  let config: CrateLayoutConfig;
  try {
    config = loadCrateConfig();
  } catch (error) {
    console.error('[crate][layout] Invalid server configuration', error);
    return NextResponse.json({ error: 'Crate layout is misconfigured' }, { status: 500 });
  }

  try {
    const layout = calculateCrateLayout(body, config);
    const expressions = renderCrateExpressions(layout, { config });
    return NextResponse.json({ layout, expressions });
  } catch (error) {
    if (isCrateLayoutError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        console.error('[crate][layout] Layout failed', error);
      }
      return NextResponse.json(
        { error: error.message, code: error.code, details: error.details ?? null },
        { status }
      );
    }
    console.error('[crate][layout] Unexpected failure', error);
    return NextResponse.json({ error: 'Failed to calculate crate layout' }, { status: 500 });
  }
}
