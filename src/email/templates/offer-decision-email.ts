import * as React from 'react';
import {
  Body,
  Container,
  Head,
  Hr,
  Html,
  Preview,
  Text,
} from '@react-email/components';
import type { OfferDecision } from '../../jobs/job.types';
import * as s from './email-styles';

export type OfferDecisionEmailProps = {
  decision: OfferDecision;
  companyName: string;
  route: string;
  pickupDate: string;
  offeredPrice: string | null;
};

export const OFFER_DECISION_SUBJECTS: Record<OfferDecision, string> = {
  won: 'Ihr Angebot wurde angenommen',
  rejected: 'Transportanfrage wurde vergeben',
};

function body(props: OfferDecisionEmailProps): string[] {
  if (props.decision === 'won') {
    return [
      `Ihr Angebot${props.offeredPrice ? ` über ${props.offeredPrice}` : ''} für die Strecke ${props.route} wurde angenommen.`,
      `Abholung: ${props.pickupDate}. Wir melden uns in Kürze mit den Details zur Abwicklung.`,
    ];
  }
  return [
    `Die Transportanfrage für die Strecke ${props.route} wurde an einen anderen Partner vergeben.`,
    'Vielen Dank für Ihr Angebot. Wir freuen uns auf die nächste Anfrage.',
  ];
}

export function offerDecisionEmailText(props: OfferDecisionEmailProps) {
  return [`Hallo ${props.companyName},`, '', ...body(props)].join('\n');
}

export function OfferDecisionEmail(props: OfferDecisionEmailProps): React.ReactElement {
  const subject = OFFER_DECISION_SUBJECTS[props.decision];

  return React.createElement(
    Html,
    { lang: 'de' },
    React.createElement(Head, null),
    React.createElement(Preview, null, subject),
    React.createElement(
      Body,
      { style: s.main },
      React.createElement(
        Container,
        { style: s.container },
        React.createElement(Text, { style: s.h1 }, subject),
        React.createElement(Text, { style: s.p }, `Hallo ${props.companyName},`),
        ...body(props).map((line, i) => React.createElement(Text, { key: i, style: s.p }, line)),
        React.createElement(Hr, { style: s.divider }),
        React.createElement(
          Text,
          { style: s.footerText },
          'Diese Nachricht wurde automatisch erstellt.',
        ),
      ),
    ),
  );
}
