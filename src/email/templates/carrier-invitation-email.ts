import * as React from 'react';
import {
  Body,
  Button,
  Container,
  Head,
  Hr,
  Html,
  Preview,
  Section,
  Text,
} from '@react-email/components';
import * as s from './email-styles';

export type CarrierInvitationEmailProps = {
  companyName: string;
  route: string;
  pickupDate: string;
  cargoSummary: string;
  distanceToPickupKm: number | null;
  offerUrl: string;
};

function details(props: CarrierInvitationEmailProps): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ['Strecke', props.route],
    ['Abholung', props.pickupDate],
    ['Ladung', props.cargoSummary],
  ];
  if (props.distanceToPickupKm !== null) {
    rows.push(['Entfernung zur Abholung', `${props.distanceToPickupKm} km`]);
  }
  return rows;
}

export function carrierInvitationEmailText(props: CarrierInvitationEmailProps) {
  return [
    `Hallo ${props.companyName},`,
    '',
    'wir haben eine neue Transportanfrage, die zu Ihrem Profil passt.',
    '',
    ...details(props).map(([key, val]) => `${key}: ${val}`),
    '',
    `Angebot abgeben: ${props.offerUrl}`,
  ].join('\n');
}

export function CarrierInvitationEmail(
  props: CarrierInvitationEmailProps,
): React.ReactElement {
  return React.createElement(
    Html,
    { lang: 'de' },
    React.createElement(Head, null),
    React.createElement(Preview, null, `Neue Transportanfrage: ${props.route}`),
    React.createElement(
      Body,
      { style: s.main },
      React.createElement(
        Container,
        { style: s.container },
        React.createElement(Text, { style: s.h1 }, 'Neue Transportanfrage'),
        React.createElement(
          Text,
          { style: s.p },
          `Hallo ${props.companyName}, wir haben eine neue Transportanfrage, die zu Ihrem Profil passt.`,
        ),
        React.createElement(
          Section,
          null,
          ...details(props).map(([key, val]) =>
            React.createElement(
              Section,
              { key },
              React.createElement(Text, { style: s.label }, key),
              React.createElement(Text, { style: s.value }, val),
            ),
          ),
        ),
        React.createElement(
          Section,
          { style: { marginTop: '16px', marginBottom: '10px' } },
          React.createElement(
            Button,
            { href: props.offerUrl, style: s.button },
            'Angebot abgeben',
          ),
        ),
        React.createElement(Hr, { style: s.divider }),
        React.createElement(
          Text,
          { style: s.footerText },
          'Sie erhalten diese E-Mail, weil Ihr Unternehmen als Transportpartner registriert ist.',
        ),
      ),
    ),
  );
}
